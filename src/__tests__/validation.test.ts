import { describe, it, expect } from 'vitest';
import {
  isValidAwsAccountId,
  isValidAwsRegion,
  isValidTagValue,
  isValidThumbprint,
  validateAwsAccountId,
  validateAwsRegion,
  validateTagValue,
} from '../utils/validation.js';
import { InvalidConfigurationError } from '../utils/errors.js';

describe('isValidAwsAccountId', () => {
  it('should accept 12-digit account IDs', () => {
    expect(isValidAwsAccountId('123456789012')).toBe(true);
    expect(isValidAwsAccountId('000000000000')).toBe(true);
  });

  it('should reject account IDs with wrong length or non-digits', () => {
    expect(isValidAwsAccountId('12345678901')).toBe(false);
    expect(isValidAwsAccountId('1234567890123')).toBe(false);
    expect(isValidAwsAccountId('')).toBe(false);
    expect(isValidAwsAccountId('12345678901a')).toBe(false);
    expect(isValidAwsAccountId('123456789012\n')).toBe(false);
  });
});

describe('isValidAwsRegion', () => {
  it('should accept commercial and partitioned regions', () => {
    expect(isValidAwsRegion('us-east-1')).toBe(true);
    expect(isValidAwsRegion('eu-west-2')).toBe(true);
    expect(isValidAwsRegion('ap-northeast-1')).toBe(true);
    expect(isValidAwsRegion('us-gov-west-1')).toBe(true);
  });

  it('should reject malformed regions', () => {
    expect(isValidAwsRegion('')).toBe(false);
    expect(isValidAwsRegion('us-east')).toBe(false);
    expect(isValidAwsRegion('US-EAST-1')).toBe(false);
    expect(isValidAwsRegion('us-east-1a')).toBe(false);
    expect(isValidAwsRegion('us-east-1; rm -rf /')).toBe(false);
  });
});

describe('isValidThumbprint', () => {
  it('should accept 40 lowercase hex characters', () => {
    expect(isValidThumbprint('6938fd4d98bab03faadb97b34396831e3780aea1')).toBe(true);
  });

  it('should reject separators, uppercase and wrong lengths', () => {
    expect(isValidThumbprint('69:38:fd:4d:98:ba:b0:3f:aa:db:97:b3:43:96:83:1e:37:80:ae:a1')).toBe(false);
    expect(isValidThumbprint('6938FD4D98BAB03FAADB97B34396831E3780AEA1')).toBe(false);
    expect(isValidThumbprint('6938fd4d98bab03faadb97b34396831e3780aea')).toBe(false);
    expect(isValidThumbprint('')).toBe(false);
  });
});

describe('isValidTagValue', () => {
  it('should accept ARNs, URLs and empty values', () => {
    expect(isValidTagValue('arn:aws:iam::123456789012:user/ci')).toBe(true);
    expect(isValidTagValue('https://github.com/acme/infra.git')).toBe(true);
    expect(isValidTagValue('')).toBe(true);
  });

  it('should reject characters AWS refuses and values over 256 characters', () => {
    expect(isValidTagValue('a,b')).toBe(false);
    expect(isValidTagValue('x'.repeat(257))).toBe(false);
    expect(isValidTagValue('x'.repeat(256))).toBe(true);
  });
});

describe('validateAwsAccountId', () => {
  it('should throw InvalidConfigurationError naming the field', () => {
    expect(() => validateAwsAccountId('12345')).toThrow(InvalidConfigurationError);
    expect(() => validateAwsAccountId('bad', 'caller account ID')).toThrow(/Invalid caller account ID/);
  });

  it('should not throw for valid account IDs', () => {
    expect(() => validateAwsAccountId('123456789012')).not.toThrow();
  });
});

describe('validateAwsRegion', () => {
  it('should throw with an example of the expected format', () => {
    expect(() => validateAwsRegion('moon-1')).toThrow(/e\.g\., us-east-1/);
  });
});

describe('validateTagValue', () => {
  it('should name the offending tag', () => {
    expect(() => validateTagValue('Owner', 'team;drop')).toThrow(/Invalid value for tag Owner: "team;drop"/);
  });
});
