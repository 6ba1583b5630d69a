#!/usr/bin/env node

/**
 * Terraform Foundation CLI
 *
 * Provision and tear down the per-repository Terraform state foundation
 */

import { program } from 'commander';
import { deployCommand } from './commands/deploy.js';
import { destroyCommand } from './commands/destroy.js';
import { listCommand } from './commands/list.js';
import { templateCommand } from './commands/template.js';
import { verifyCommand } from './commands/verify.js';

program
  .name('tf-foundation')
  .description('Terraform foundation CLI - state bucket, lock table, OIDC provider and deployment role as one CloudFormation stack')
  .version('0.1.0');

program
  .command('deploy')
  .description('Create or update the foundation stack for the current repository')
  .option('--region <region>', 'AWS region (default: AWS_REGION, shared config, then us-east-1)')
  .option('--on-orphans <action>', 'What to do with resources left by a previous stack: import or discard')
  .option('--poll-interval <seconds>', 'Seconds between stack status checks', '5')
  .option('--timeout <minutes>', 'Minutes to wait for a stack operation', '30')
  .option('--verbose', 'Enable verbose logging for debugging')
  .action(deployCommand);

program
  .command('destroy')
  .description('Delete the foundation stack; buckets are kept unless confirmed separately')
  .option('--region <region>', 'AWS region (default: AWS_REGION, shared config, then us-east-1)')
  .option('--poll-interval <seconds>', 'Seconds between stack status checks', '5')
  .option('--timeout <minutes>', 'Minutes to wait for a stack operation', '30')
  .option('--verbose', 'Enable verbose logging for debugging')
  .action(destroyCommand);

program
  .command('list')
  .description('Show the foundation stack, its resources, published parameters and orphans')
  .option('--region <region>', 'AWS region (default: AWS_REGION, shared config, then us-east-1)')
  .option('--verbose', 'Enable verbose logging for debugging')
  .action(listCommand);

program
  .command('verify')
  .description('Check git state, AWS credentials and permissions')
  .option('--region <region>', 'AWS region (default: AWS_REGION, shared config, then us-east-1)')
  .option('--verbose', 'Enable verbose logging for debugging')
  .action(verifyCommand);

program
  .command('template')
  .description('Print the CloudFormation template for the current repository')
  .option('--json', 'Print JSON instead of YAML')
  .option('--verbose', 'Enable verbose logging for debugging')
  .action(templateCommand);

await program.parseAsync();
