/**
 * Input validation for values captured from the environment
 */

import { InvalidConfigurationError } from './errors.js';

/**
 * AWS Account ID format: exactly 12 digits
 */
const AWS_ACCOUNT_ID_REGEX = /^\d{12}$/;

/**
 * AWS Region format: e.g., us-east-1, eu-west-2, us-gov-west-1
 */
const AWS_REGION_REGEX = /^[a-z]{2}(-gov|-iso[a-z]?)?-[a-z]+-\d$/;

/**
 * SHA-1 certificate fingerprint: 40 lowercase hex characters, no separators
 */
const THUMBPRINT_REGEX = /^[0-9a-f]{40}$/;

/**
 * Characters AWS accepts in tag values
 */
const TAG_VALUE_REGEX = /^[\p{L}\p{Z}\p{N}_.:/=+\-@]*$/u;
const TAG_VALUE_MAX_LENGTH = 256;

export function isValidAwsAccountId(accountId: string): boolean {
  return AWS_ACCOUNT_ID_REGEX.test(accountId);
}

export function isValidAwsRegion(region: string): boolean {
  return AWS_REGION_REGEX.test(region);
}

export function isValidThumbprint(thumbprint: string): boolean {
  return THUMBPRINT_REGEX.test(thumbprint);
}

export function isValidTagValue(value: string): boolean {
  return value.length <= TAG_VALUE_MAX_LENGTH && TAG_VALUE_REGEX.test(value);
}

/**
 * @throws InvalidConfigurationError if the account ID is invalid
 */
export function validateAwsAccountId(accountId: string, fieldName = 'AWS account ID'): void {
  if (!isValidAwsAccountId(accountId)) {
    throw new InvalidConfigurationError(
      `Invalid ${fieldName}: "${accountId}". AWS account IDs must be exactly 12 digits.`
    );
  }
}

/**
 * @throws InvalidConfigurationError if the region is invalid
 */
export function validateAwsRegion(region: string, fieldName = 'AWS region'): void {
  if (!isValidAwsRegion(region)) {
    throw new InvalidConfigurationError(
      `Invalid ${fieldName}: "${region}". Expected a valid AWS region (e.g., us-east-1, eu-west-2).`
    );
  }
}

/**
 * @throws InvalidConfigurationError naming the tag if its value would be rejected by AWS
 */
export function validateTagValue(tagName: string, value: string): void {
  if (!isValidTagValue(value)) {
    throw new InvalidConfigurationError(
      `Invalid value for tag ${tagName}: "${value}". Tag values allow up to ${TAG_VALUE_MAX_LENGTH} letters, digits, spaces and _ . : / = + - @`
    );
  }
}
