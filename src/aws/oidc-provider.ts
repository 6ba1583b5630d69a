/**
 * OIDC Identity Provider management
 *
 * The provider is created by the foundation stack; these calls only find and
 * remove providers that a failed first deployment left outside the stack.
 */

import {
  IAMClient,
  DeleteOpenIDConnectProviderCommand,
  ListOpenIDConnectProvidersCommand,
  NoSuchEntityException,
} from '@aws-sdk/client-iam';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import type { IdentityProviderGateway } from '../types/gateways.js';
import * as logger from '../utils/logger.js';

export class AwsIdentityProviderGateway implements IdentityProviderGateway {
  private readonly client: IAMClient;

  constructor(region: string, credentials?: AwsCredentialIdentity) {
    this.client = new IAMClient({ region, credentials });
  }

  async listProviderArns(): Promise<string[]> {
    const response = await this.client.send(new ListOpenIDConnectProvidersCommand({}));
    return (response.OpenIDConnectProviderList ?? []).flatMap(provider => (provider.Arn ? [provider.Arn] : []));
  }

  async deleteProvider(arn: string): Promise<void> {
    try {
      await this.client.send(new DeleteOpenIDConnectProviderCommand({ OpenIDConnectProviderArn: arn }));
    } catch (error) {
      if (error instanceof NoSuchEntityException) {
        logger.verbose(`OIDC provider ${arn} was already gone`);
        return;
      }
      throw error;
    }
  }
}

/**
 * Whether a provider ARN belongs to the issuer, in any partition
 */
export function isProviderForIssuer(arn: string, issuerHostPath: string): boolean {
  return arn.endsWith(`:oidc-provider/${issuerHostPath}`);
}
