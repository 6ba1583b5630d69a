/**
 * User prompts and confirmations
 */

import inquirer from 'inquirer';
import * as logger from './logger.js';
import type {
  ConfirmationProvider,
  DestroySummary,
  OrphanCandidate,
  OrphanDisposition,
} from '../types/stacks.js';

export const DESTROY_PHRASE = 'DESTROY';
export const DELETE_BUCKETS_PHRASE = 'DELETE BUCKETS';

async function typedConfirmation(message: string, phrase: string): Promise<boolean> {
  const { answer } = await inquirer.prompt<{ answer: string }>([
    {
      type: 'input',
      name: 'answer',
      message: `${message} Type ${phrase} to confirm:`,
    },
  ]);
  return answer.trim() === phrase;
}

/**
 * Interactive confirmations on the terminal. A disposition passed in up front
 * answers the orphan question without prompting.
 */
export class InteractiveConfirmations implements ConfirmationProvider {
  constructor(private readonly presetDisposition?: OrphanDisposition) {}

  async chooseOrphanDisposition(candidates: OrphanCandidate[]): Promise<OrphanDisposition> {
    logger.warn('Found resources from a previous deployment that no stack owns:');
    logger.table([
      ['Resource', 'Template slot', 'Matched by'],
      ...candidates.map(c => [c.physicalId, c.logicalId ?? '-', c.confidence]),
    ]);

    if (this.presetDisposition) {
      logger.info(`Using --on-orphans ${this.presetDisposition}`);
      return this.presetDisposition;
    }

    const { disposition } = await inquirer.prompt<{ disposition: OrphanDisposition }>([
      {
        type: 'list',
        name: 'disposition',
        message: 'How should they be handled?',
        choices: [
          { name: 'Import them into the new stack (keeps existing Terraform state)', value: 'import' },
          { name: 'Delete them and start fresh (destroys all object versions)', value: 'discard' },
        ],
        default: 'import',
      },
    ]);
    return disposition;
  }

  async confirmDestroy(summary: DestroySummary): Promise<boolean> {
    logger.header('Destroy Summary');

    if (summary.stackExists) {
      console.log(`Stack: ${summary.stackName}`);
      if (summary.lockTable) {
        console.log(`Lock table: ${summary.lockTable}`);
      }
      for (const parameter of summary.parameters) {
        console.log(`Parameter: ${parameter}`);
      }
    } else {
      console.log(`Stack ${summary.stackName} does not exist; only orphaned buckets remain.`);
    }
    for (const bucket of summary.buckets) {
      console.log(`Bucket (retained unless confirmed separately): ${bucket}`);
    }
    logger.newline();

    return typedConfirmation('This removes the Terraform foundation.', DESTROY_PHRASE);
  }

  async confirmBucketDeletion(buckets: string[]): Promise<boolean> {
    logger.warn('Deleting the buckets permanently removes every version of every Terraform state file:');
    for (const bucket of buckets) {
      logger.detail(bucket);
    }
    return typedConfirmation('Buckets are kept otherwise.', DELETE_BUCKETS_PHRASE);
  }
}
