/**
 * OIDC federation settings derived from the repository remote URL
 *
 * Each supported hosting platform carries a fixed issuer and audience. GitHub
 * and Bitbucket publish stable certificate thumbprints that are pinned here;
 * GitLab's thumbprint is computed from the issuer's TLS leaf certificate.
 */

import { normalizeRepositoryUrl } from '../naming/index.js';
import { UnsupportedProviderError, errorMessage } from '../utils/errors.js';
import { isValidThumbprint } from '../utils/validation.js';
import * as logger from '../utils/logger.js';
import type { IdentityProviderConfig, IdentityProviderKind } from '../types/config.js';

/**
 * Returns the SHA-1 fingerprint of the TLS leaf certificate served by `host`
 */
export type FingerprintFetcher = (host: string) => Promise<string>;

const AWS_STS_AUDIENCE = 'sts.amazonaws.com';

const GITHUB_ISSUER = 'https://token.actions.githubusercontent.com';
const GITHUB_THUMBPRINTS = [
  '6938fd4d98bab03faadb97b34396831e3780aea1',
  '1c58a3a8518e8759bf075b76b750d4f2df264fcd',
];

const GITLAB_ISSUER = 'https://gitlab.com';

const BITBUCKET_THUMBPRINTS = ['a031c46782e6e6c662c2c87c76da9aa62ccabd8e'];

const PROVIDER_HOSTS: Record<string, IdentityProviderKind> = {
  'github.com': 'github',
  'gitlab.com': 'gitlab',
  'bitbucket.org': 'bitbucket',
};

export const PROVIDER_DISPLAY_NAMES: Record<IdentityProviderKind, string> = {
  github: 'GitHub',
  gitlab: 'GitLab',
  bitbucket: 'Bitbucket',
};

interface ParsedRemote {
  host: string;
  pathSegments: string[];
}

function parseRemote(repositoryUrl: string): ParsedRemote {
  let url: URL;
  try {
    url = new URL(normalizeRepositoryUrl(repositoryUrl));
  } catch {
    throw new UnsupportedProviderError(repositoryUrl, 'not a recognizable git remote URL');
  }
  return {
    host: url.hostname.toLowerCase(),
    pathSegments: url.pathname.split('/').filter(segment => segment.length > 0),
  };
}

/**
 * Classify the hosting platform without touching the network
 */
export function detectProviderKind(repositoryUrl: string): IdentityProviderKind {
  const { host } = parseRemote(repositoryUrl);
  const kind = PROVIDER_HOSTS[host];
  if (!kind) {
    throw new UnsupportedProviderError(repositoryUrl);
  }
  return kind;
}

/**
 * Build the IdentityProviderConfig for a repository remote.
 * Unknown hosts fail before any network call is made.
 */
export async function resolveIdentityProvider(
  repositoryUrl: string,
  fetchFingerprint: FingerprintFetcher
): Promise<IdentityProviderConfig> {
  const kind = detectProviderKind(repositoryUrl);

  switch (kind) {
    case 'github':
      return {
        kind,
        issuerUrl: GITHUB_ISSUER,
        audience: AWS_STS_AUDIENCE,
        thumbprints: [...GITHUB_THUMBPRINTS],
      };

    case 'gitlab': {
      const thumbprint = await computeThumbprint(repositoryUrl, GITLAB_ISSUER, fetchFingerprint);
      return {
        kind,
        issuerUrl: GITLAB_ISSUER,
        audience: AWS_STS_AUDIENCE,
        thumbprints: [thumbprint],
      };
    }

    case 'bitbucket': {
      const workspace = parseRemote(repositoryUrl).pathSegments[0];
      if (!workspace) {
        throw new UnsupportedProviderError(repositoryUrl, 'no Bitbucket workspace in the repository path');
      }
      return {
        kind,
        issuerUrl: `https://api.bitbucket.org/2.0/workspaces/${workspace}/pipelines-config/identity/oidc`,
        audience: `ari:cloud:bitbucket::workspace/${workspace}`,
        thumbprints: [...BITBUCKET_THUMBPRINTS],
      };
    }
  }
}

/**
 * Normalize a fingerprint to lowercase hex without separators
 */
export function normalizeFingerprint(fingerprint: string): string {
  return fingerprint.replace(/[:\s]/g, '').toLowerCase();
}

async function computeThumbprint(
  repositoryUrl: string,
  issuerUrl: string,
  fetchFingerprint: FingerprintFetcher
): Promise<string> {
  const host = new URL(issuerUrl).hostname;
  logger.verbose(`Calculating certificate thumbprint for ${host}...`);

  let raw: string;
  try {
    raw = await fetchFingerprint(host);
  } catch (error) {
    throw new UnsupportedProviderError(
      repositoryUrl,
      `failed to retrieve the TLS certificate of ${host}: ${errorMessage(error)}`
    );
  }

  const thumbprint = normalizeFingerprint(raw);
  if (!isValidThumbprint(thumbprint)) {
    throw new UnsupportedProviderError(
      repositoryUrl,
      `certificate thumbprint for ${host} is malformed ("${raw}")`
    );
  }

  logger.verbose(`Thumbprint for ${host}: ${thumbprint}`);
  return thumbprint;
}

/**
 * Issuer URL without the scheme, as it appears in IAM OIDC provider ARNs
 * and in trust-policy condition keys
 */
export function issuerHostPath(issuerUrl: string): string {
  return issuerUrl.replace(/^https:\/\//, '').replace(/\/+$/, '');
}
