/**
 * AWS-related types
 */

export interface CurrentIdentity {
  accountId: string;
  arn: string;
  userId: string;
}

export interface CloudFormationTemplate {
  AWSTemplateFormatVersion: string;
  Description: string;
  Parameters: Record<string, CloudFormationParameter>;
  Resources: Record<string, CloudFormationResource>;
  Outputs?: Record<string, CloudFormationOutput>;
}

export interface CloudFormationParameter {
  Type: 'String' | 'CommaDelimitedList';
  Default?: string;
  Description?: string;
  AllowedValues?: string[];
}

export type DeletionPolicy = 'Delete' | 'Retain' | 'RetainExceptOnCreate';

export interface CloudFormationResource {
  Type: string;
  DeletionPolicy?: DeletionPolicy;
  UpdateReplacePolicy?: DeletionPolicy;
  Properties: Record<string, unknown>;
  DependsOn?: string | string[];
}

export interface CloudFormationOutput {
  Description?: string;
  Value: unknown;
  Export?: {
    Name: string;
  };
}

export interface Tag {
  Key: string;
  Value: string;
}
