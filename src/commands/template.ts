/**
 * Template command: print the CloudFormation template deploy would submit
 */

import { stringify } from 'yaml';
import { fetchLeafCertificateFingerprint } from '../oidc/certificate.js';
import { resolveIdentityProvider } from '../oidc/identity-provider.js';
import { projectNameFromRepository } from '../naming/index.js';
import { generateFoundationStackTemplate } from '../templates/foundation-stack.js';
import type { GlobalOptions } from '../types/config.js';
import { setVerbose } from '../utils/logger.js';
import { failCommand, repositoryRemote } from './shared.js';

export interface TemplateOptions extends GlobalOptions {
  json?: boolean;
}

export async function templateCommand(options: TemplateOptions): Promise<void> {
  try {
    if (options.verbose) {
      setVerbose(true);
    }

    const repositoryUrl = await repositoryRemote();
    const template = generateFoundationStackTemplate({
      project: projectNameFromRepository(repositoryUrl),
      identityProvider: await resolveIdentityProvider(repositoryUrl, fetchLeafCertificateFingerprint),
    });

    console.log(options.json ? JSON.stringify(template, null, 2) : stringify(template));
  } catch (error) {
    failCommand(error);
  }
}
