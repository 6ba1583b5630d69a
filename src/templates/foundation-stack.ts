/**
 * Foundation Stack CloudFormation Template Generator
 *
 * One stack per repository, holding:
 * - Terraform state bucket and its access-log bucket (retained on delete)
 * - DynamoDB lock table
 * - OIDC identity provider for the repository's hosting platform
 * - Role assumed by the deployment-roles repository pipeline
 */

import type { CloudFormationTemplate, Tag } from '../types/aws.js';
import {
  LOGICAL_IDS,
  STACK_OUTPUTS,
  type DeploymentParameters,
  type IdentityProviderConfig,
} from '../types/config.js';
import type { StackParameter, StackRequest } from '../types/gateways.js';
import {
  buildOidcTrustPolicy,
  createBaseTemplate,
  createIamRoleResource,
  createS3BucketResource,
  regionalNameExpression,
} from './common.js';
import {
  LOCK_TABLE_NAME,
  LOG_BUCKET_PURPOSE,
  STATE_BUCKET_PURPOSE,
  deploymentRolesRoleName,
} from '../naming/index.js';
import { issuerHostPath } from '../oidc/identity-provider.js';

export interface FoundationStackOptions {
  project: string;
  identityProvider: IdentityProviderConfig;
}

const STATE_ACCESS_LOG_PREFIX = 'state-access-logs/';
const LOG_RETENTION_DAYS = 365;

/**
 * Generate the CloudFormation template for the foundation stack
 */
export function generateFoundationStackTemplate(options: FoundationStackOptions): CloudFormationTemplate {
  const { project, identityProvider } = options;
  const template = createBaseTemplate(`Terraform foundation for ${project}`);
  template.Parameters = foundationParameters();

  const logBucketName = regionalNameExpression(LOG_BUCKET_PURPOSE);

  // 1. Access-log bucket
  template.Resources[LOGICAL_IDS.logBucket] = createS3BucketResource(logBucketName, {
    lifecycleRules: [
      {
        Id: 'ExpireAccessLogs',
        Status: 'Enabled',
        ExpirationInDays: LOG_RETENTION_DAYS,
        NoncurrentVersionExpiration: { NoncurrentDays: 30 },
      },
    ],
  });

  template.Resources.TerraformStateLogBucketPolicy = {
    Type: 'AWS::S3::BucketPolicy',
    Properties: {
      Bucket: { Ref: LOGICAL_IDS.logBucket },
      PolicyDocument: {
        Version: '2012-10-17',
        Statement: [
          {
            Sid: 'AllowServerAccessLogs',
            Effect: 'Allow',
            Principal: { Service: 'logging.s3.amazonaws.com' },
            Action: 's3:PutObject',
            Resource: { 'Fn::Sub': `arn:\${AWS::Partition}:s3:::\${${LOGICAL_IDS.logBucket}}/${STATE_ACCESS_LOG_PREFIX}*` },
            Condition: {
              StringEquals: { 'aws:SourceAccount': { Ref: 'AWS::AccountId' } },
            },
          },
        ],
      },
    },
  };

  // 2. Terraform state bucket, logging into the bucket above by name so that
  //    it can be imported on its own
  template.Resources[LOGICAL_IDS.stateBucket] = createS3BucketResource(
    regionalNameExpression(STATE_BUCKET_PURPOSE),
    {
      logging: { destinationBucketName: logBucketName, prefix: STATE_ACCESS_LOG_PREFIX },
      dependsOn: ['TerraformStateLogBucketPolicy'],
    }
  );

  // 3. Lock table
  template.Resources[LOGICAL_IDS.lockTable] = {
    Type: 'AWS::DynamoDB::Table',
    DeletionPolicy: 'Delete',
    Properties: {
      TableName: LOCK_TABLE_NAME,
      BillingMode: 'PAY_PER_REQUEST',
      AttributeDefinitions: [{ AttributeName: 'LockID', AttributeType: 'S' }],
      KeySchema: [{ AttributeName: 'LockID', KeyType: 'HASH' }],
      DeletionProtectionEnabled: true,
      PointInTimeRecoverySpecification: { PointInTimeRecoveryEnabled: true },
      SSESpecification: { SSEEnabled: true },
    },
  };

  // 4. OIDC provider
  template.Resources[LOGICAL_IDS.oidcProvider] = {
    Type: 'AWS::IAM::OIDCProvider',
    Properties: {
      Url: { Ref: 'OidcUrl' },
      ClientIdList: [{ Ref: 'OidcAudience' }],
      ThumbprintList: { Ref: 'OidcThumbprints' },
    },
  };

  // 5. Deployment-roles role
  template.Resources[LOGICAL_IDS.deploymentRolesRole] = createIamRoleResource(
    deploymentRolesRoleName(project),
    buildOidcTrustPolicy(
      identityProvider.kind,
      issuerHostPath(identityProvider.issuerUrl),
      LOGICAL_IDS.oidcProvider
    ),
    [deploymentRolesPolicy()]
  );

  template.Outputs = {
    [STACK_OUTPUTS.stateBucket]: {
      Description: 'Terraform state bucket',
      Value: { Ref: LOGICAL_IDS.stateBucket },
    },
    [STACK_OUTPUTS.logBucket]: {
      Description: 'Access-log bucket for the state bucket',
      Value: { Ref: LOGICAL_IDS.logBucket },
    },
    [STACK_OUTPUTS.lockTable]: {
      Description: 'Terraform state lock table',
      Value: { Ref: LOGICAL_IDS.lockTable },
    },
    [STACK_OUTPUTS.oidcProviderArn]: {
      Description: 'OIDC identity provider ARN',
      Value: { Ref: LOGICAL_IDS.oidcProvider },
    },
    [STACK_OUTPUTS.deploymentRolesRoleArn]: {
      Description: 'Role assumed by the deployment-roles repository',
      Value: { 'Fn::GetAtt': [LOGICAL_IDS.deploymentRolesRole, 'Arn'] },
    },
  };

  return template;
}

/**
 * Template holding only the resources being adopted by an import change set.
 * CloudFormation rejects imports that also create or output anything else.
 */
export function generateImportTemplate(
  options: FoundationStackOptions,
  logicalIds: readonly string[]
): CloudFormationTemplate {
  const full = generateFoundationStackTemplate(options);
  const template = createBaseTemplate(full.Description);
  template.Parameters = full.Parameters;
  delete template.Outputs;

  for (const logicalId of logicalIds) {
    const resource = full.Resources[logicalId];
    if (!resource) {
      throw new Error(`Template has no resource ${logicalId} to import`);
    }
    const { DependsOn: _dependsOn, ...standalone } = resource;
    template.Resources[logicalId] = standalone;
  }

  return template;
}

function foundationParameters(): CloudFormationTemplate['Parameters'] {
  const text = (description: string) => ({ Type: 'String' as const, Description: description });

  return {
    AccountAlias: { ...text('IAM account alias (may be empty)'), Default: '' },
    CostCenter: text('Cost center tag value'),
    DeploymentRole: text('ARN of the principal that ran the deployment'),
    Environment: text('Environment tag value'),
    ManagedBy: { ...text('Tool managing these resources'), Default: 'CloudFormation' },
    Owner: text('Owner tag value'),
    Project: text('Project (repository) name'),
    Region: text('Deployment region'),
    Repository: text('Repository URL'),
    TargetDeploymentRolesRepository: text('<org>/<repo> allowed to assume the deployment-roles role'),
    OidcProvider: { ...text('OIDC provider kind'), AllowedValues: ['github', 'gitlab', 'bitbucket'] },
    OidcUrl: text('OIDC issuer URL'),
    OidcAudience: text('OIDC audience'),
    OidcThumbprints: { Type: 'CommaDelimitedList', Description: 'Issuer certificate thumbprints' },
  };
}

/**
 * Permissions for the pipeline that manages deployment roles: IAM role
 * administration plus access to its own Terraform state
 */
function deploymentRolesPolicy(): object {
  return {
    PolicyName: 'DeploymentRolesManagement',
    PolicyDocument: {
      Version: '2012-10-17',
      Statement: [
        {
          Sid: 'ManageRoles',
          Effect: 'Allow',
          Action: [
            'iam:CreateRole',
            'iam:DeleteRole',
            'iam:GetRole',
            'iam:UpdateRole',
            'iam:UpdateAssumeRolePolicy',
            'iam:TagRole',
            'iam:UntagRole',
            'iam:ListRoleTags',
            'iam:PutRolePolicy',
            'iam:GetRolePolicy',
            'iam:DeleteRolePolicy',
            'iam:ListRolePolicies',
            'iam:AttachRolePolicy',
            'iam:DetachRolePolicy',
            'iam:ListAttachedRolePolicies',
            'iam:ListInstanceProfilesForRole',
          ],
          Resource: { 'Fn::Sub': 'arn:${AWS::Partition}:iam::${AWS::AccountId}:role/*' },
        },
        {
          Sid: 'ManagePolicies',
          Effect: 'Allow',
          Action: [
            'iam:CreatePolicy',
            'iam:DeletePolicy',
            'iam:GetPolicy',
            'iam:GetPolicyVersion',
            'iam:CreatePolicyVersion',
            'iam:DeletePolicyVersion',
            'iam:ListPolicyVersions',
            'iam:TagPolicy',
          ],
          Resource: { 'Fn::Sub': 'arn:${AWS::Partition}:iam::${AWS::AccountId}:policy/*' },
        },
        {
          Sid: 'TerraformState',
          Effect: 'Allow',
          Action: ['s3:ListBucket', 's3:GetObject', 's3:PutObject', 's3:DeleteObject'],
          Resource: [
            { 'Fn::GetAtt': [LOGICAL_IDS.stateBucket, 'Arn'] },
            { 'Fn::Sub': `\${${LOGICAL_IDS.stateBucket}.Arn}/*` },
          ],
        },
        {
          Sid: 'TerraformLocks',
          Effect: 'Allow',
          Action: ['dynamodb:GetItem', 'dynamodb:PutItem', 'dynamodb:DeleteItem', 'dynamodb:DescribeTable'],
          Resource: { 'Fn::GetAtt': [LOGICAL_IDS.lockTable, 'Arn'] },
        },
        {
          Sid: 'FoundationParameters',
          Effect: 'Allow',
          Action: ['ssm:GetParameter', 'ssm:GetParameters'],
          Resource: { 'Fn::Sub': 'arn:${AWS::Partition}:ssm:${AWS::Region}:${AWS::AccountId}:parameter/terraform/foundation/*' },
        },
      ],
    },
  };
}

/**
 * Template parameter values for a run
 */
export function buildStackParameters(params: DeploymentParameters): StackParameter[] {
  const values: Record<string, string> = {
    AccountAlias: params.accountAlias,
    CostCenter: params.tags.costCenter,
    DeploymentRole: params.deploymentRole,
    Environment: params.tags.environment,
    ManagedBy: params.tags.managedBy,
    Owner: params.tags.owner,
    Project: params.project,
    Region: params.region,
    Repository: params.repository,
    TargetDeploymentRolesRepository: params.targetRepository,
    OidcProvider: params.identityProvider.kind,
    OidcUrl: params.identityProvider.issuerUrl,
    OidcAudience: params.identityProvider.audience,
    OidcThumbprints: params.identityProvider.thumbprints.join(','),
  };
  return Object.entries(values).map(([key, value]) => ({ key, value }));
}

/**
 * Stack-level tags, propagated by CloudFormation to every taggable resource
 */
export function buildStackTags(params: DeploymentParameters): Tag[] {
  return [
    { Key: 'AccountId', Value: params.accountId },
    { Key: 'AccountAlias', Value: params.accountAlias },
    { Key: 'CostCenter', Value: params.tags.costCenter },
    { Key: 'DeploymentRole', Value: params.deploymentRole },
    { Key: 'Environment', Value: params.tags.environment },
    { Key: 'ManagedBy', Value: params.tags.managedBy },
    { Key: 'Owner', Value: params.tags.owner },
    { Key: 'Project', Value: params.project },
    { Key: 'Region', Value: params.region },
    { Key: 'Repository', Value: params.repository },
  ];
}

export function buildStackRequest(params: DeploymentParameters, template: CloudFormationTemplate): StackRequest {
  return {
    stackName: params.stackName,
    templateBody: JSON.stringify(template),
    parameters: buildStackParameters(params),
    tags: buildStackTags(params),
  };
}
