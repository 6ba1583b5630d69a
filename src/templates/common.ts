/**
 * Shared template utilities for CloudFormation template generation
 */

import type { CloudFormationTemplate, CloudFormationResource, DeletionPolicy } from '../types/aws.js';
import type { IdentityProviderKind } from '../types/config.js';

/**
 * Create a base CloudFormation template with standard structure
 */
export function createBaseTemplate(description: string): CloudFormationTemplate {
  return {
    AWSTemplateFormatVersion: '2010-09-09',
    Description: description,
    Parameters: {},
    Resources: {},
    Outputs: {},
  };
}

/**
 * Name derived from the stack's own account and region: <purpose>-<account>-<region>
 */
export function regionalNameExpression(purpose: string): object {
  return { 'Fn::Sub': `${purpose}-\${AWS::AccountId}-\${AWS::Region}` };
}

export interface BucketResourceOptions {
  deletionPolicy?: DeletionPolicy;
  logging?: { destinationBucketName: unknown; prefix: string };
  lifecycleRules?: object[];
  dependsOn?: string[];
}

/**
 * Create an S3 bucket resource with standard security configuration
 */
export function createS3BucketResource(
  bucketName: unknown,
  options: BucketResourceOptions = {}
): CloudFormationResource {
  const deletionPolicy = options.deletionPolicy ?? 'Retain';

  return {
    Type: 'AWS::S3::Bucket',
    DeletionPolicy: deletionPolicy,
    UpdateReplacePolicy: deletionPolicy,
    ...(options.dependsOn && options.dependsOn.length > 0 ? { DependsOn: options.dependsOn } : {}),
    Properties: {
      BucketName: bucketName,
      VersioningConfiguration: { Status: 'Enabled' },
      BucketEncryption: {
        ServerSideEncryptionConfiguration: [
          {
            ServerSideEncryptionByDefault: {
              SSEAlgorithm: 'AES256',
            },
          },
        ],
      },
      PublicAccessBlockConfiguration: {
        BlockPublicAcls: true,
        BlockPublicPolicy: true,
        IgnorePublicAcls: true,
        RestrictPublicBuckets: true,
      },
      OwnershipControls: {
        Rules: [{ ObjectOwnership: 'BucketOwnerEnforced' }],
      },
      ...(options.logging
        ? {
            LoggingConfiguration: {
              DestinationBucketName: options.logging.destinationBucketName,
              LogFilePrefix: options.logging.prefix,
            },
          }
        : {}),
      ...(options.lifecycleRules ? { LifecycleConfiguration: { Rules: options.lifecycleRules } } : {}),
    },
  };
}

/**
 * Subject claim pattern that restricts a role to one repository, when the
 * provider's token carries one
 */
function subjectPattern(kind: IdentityProviderKind): string | undefined {
  switch (kind) {
    case 'github':
      return 'repo:${TargetDeploymentRolesRepository}:*';
    case 'gitlab':
      return 'project_path:${TargetDeploymentRolesRepository}:*';
    case 'bitbucket':
      // Bitbucket subjects are repository UUIDs; the workspace audience is the boundary
      return undefined;
  }
}

/**
 * Build a trust policy for OIDC federation.
 *
 * Condition keys embed the issuer host, which CloudFormation cannot compute,
 * so the host is written into the template literally.
 */
export function buildOidcTrustPolicy(
  kind: IdentityProviderKind,
  issuerHostPath: string,
  providerLogicalId: string
): object {
  const subject = subjectPattern(kind);

  return {
    Version: '2012-10-17',
    Statement: [
      {
        Effect: 'Allow',
        Principal: {
          Federated: { Ref: providerLogicalId },
        },
        Action: 'sts:AssumeRoleWithWebIdentity',
        Condition: {
          StringEquals: {
            [`${issuerHostPath}:aud`]: { Ref: 'OidcAudience' },
          },
          ...(subject
            ? {
                StringLike: {
                  [`${issuerHostPath}:sub`]: { 'Fn::Sub': subject },
                },
              }
            : {}),
        },
      },
    ],
  };
}

/**
 * Create an IAM role resource
 */
export function createIamRoleResource(
  roleName: string,
  trustPolicy: object,
  policies: object[]
): CloudFormationResource {
  return {
    Type: 'AWS::IAM::Role',
    Properties: {
      RoleName: roleName,
      AssumeRolePolicyDocument: trustPolicy,
      MaxSessionDuration: 3600,
      ...(policies.length > 0 ? { Policies: policies } : {}),
    },
  };
}
