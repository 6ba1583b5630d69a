/**
 * Deploy flow: resolve, plan, execute, verify, publish
 */

import { BucketReclaimer, type ReclaimResult } from '../aws/bucket-reclaimer.js';
import { isProviderForIssuer } from '../aws/oidc-provider.js';
import { publishFoundationParameters } from '../aws/ssm.js';
import { foundationResourceNames } from '../naming/index.js';
import { issuerHostPath } from '../oidc/identity-provider.js';
import {
  buildStackRequest,
  generateFoundationStackTemplate,
  generateImportTemplate,
  type FoundationStackOptions,
} from '../templates/foundation-stack.js';
import { STACK_OUTPUTS, type DeploymentParameters } from '../types/config.js';
import type { CloudGateways, ImportTarget, StackRequest } from '../types/gateways.js';
import type {
  ConfirmationProvider,
  DeploymentOutcome,
  OrphanCandidate,
  OrphanDisposition,
  ResourceFailure,
  StackResolution,
  TransitionDecision,
} from '../types/stacks.js';
import {
  IrrecoverableStateError,
  PartialFailureError,
  StateConflictError,
  FoundationError,
  describeFailures,
  ensureNotCancelled,
  errorMessage,
} from '../utils/errors.js';
import type { RetryOptions } from '../utils/retry.js';
import * as logger from '../utils/logger.js';
import { StackStateResolver } from './stack-state.js';
import { StackWaiter, type StackWaiterOptions } from './stack-waiter.js';
import { planTransition } from './transitions.js';

export interface DeploymentContext {
  params: DeploymentParameters;
  gateways: CloudGateways;
  confirmations: ConfirmationProvider;
  wait: StackWaiterOptions;
  /** Pre-selected answer for the orphan prompt */
  disposition?: OrphanDisposition;
  reclaimer?: BucketReclaimer;
  retry?: RetryOptions;
  /** Current time, used to filter stack events to the operation being waited on */
  clock?: () => Date;
}

export interface DeploymentReport {
  stackName: string;
  transition: TransitionDecision['type'];
  outcome: DeploymentOutcome;
  outputs: Record<string, string>;
  publishedParameters: string[];
  reclaimed: ReclaimResult[];
  /** Project-tagged leftovers with no template slot, reported but untouched */
  untrackedOrphans: OrphanCandidate[];
}

/**
 * Bring the foundation stack to its desired state
 */
export async function deployFoundation(context: DeploymentContext): Promise<DeploymentReport> {
  const { params, gateways } = context;
  const signal = context.wait.signal;

  const resolver = new StackStateResolver(gateways.stacks, gateways.buckets, context.retry);
  const resolution = await resolver.resolve(params);

  const untrackedOrphans = resolution.orphans.filter(orphan => orphan.logicalId === undefined);
  for (const orphan of untrackedOrphans) {
    logger.warn(`Bucket ${orphan.physicalId} carries Project=${params.project} but is not part of any stack; leaving it alone`);
  }

  let decision = planTransition(resolution, context.disposition);
  if (decision.type === 'CONFIRM_ORPHANS') {
    ensureNotCancelled(signal);
    const disposition = await context.confirmations.chooseOrphanDisposition(decision.candidates);
    decision = planTransition(resolution, disposition);
  }

  const executor = new DeploymentExecutor(context);
  const outcome = await executor.execute(decision, resolution);

  const outputs = await executor.verifyOutputs();
  ensureNotCancelled(signal);
  const published = await publishFoundationParameters(gateways.parameters, outputs);

  return {
    stackName: params.stackName,
    transition: decision.type,
    outcome,
    outputs,
    publishedParameters: [...published.written, ...published.unchanged],
    reclaimed: executor.reclaimed,
    untrackedOrphans,
  };
}

const REQUIRED_OUTPUTS = Object.values(STACK_OUTPUTS);

/**
 * Carries out one planned transition and blocks until it settles
 */
export class DeploymentExecutor {
  readonly reclaimed: ReclaimResult[] = [];

  private readonly params: DeploymentParameters;
  private readonly gateways: CloudGateways;
  private readonly waiter: StackWaiter;
  private readonly reclaimer: BucketReclaimer;
  private readonly signal?: AbortSignal;
  private readonly clock: () => Date;
  private readonly templateOptions: FoundationStackOptions;

  constructor(context: DeploymentContext) {
    this.params = context.params;
    this.gateways = context.gateways;
    this.signal = context.wait.signal;
    this.waiter = new StackWaiter(context.gateways.stacks, context.wait);
    this.reclaimer = context.reclaimer ?? new BucketReclaimer(context.gateways.buckets, { retry: context.retry });
    this.clock = context.clock ?? (() => new Date());
    this.templateOptions = {
      project: context.params.project,
      identityProvider: context.params.identityProvider,
    };
  }

  async execute(decision: TransitionDecision, resolution: StackResolution): Promise<DeploymentOutcome> {
    const { stackName } = this.params;

    switch (decision.type) {
      case 'CREATE':
        logger.info(`Creating stack ${stackName}...`);
        await this.create();
        return 'created';

      case 'UPDATE':
        if (decision.bestEffort) {
          logger.warn(`Stack ${stackName} is in unexpected status ${resolution.rawStatus ?? 'unknown'}; attempting an update`);
        }
        logger.info(`Updating stack ${stackName}...`);
        return this.update();

      case 'IMPORT':
        logger.info(`Creating stack ${stackName} by importing ${decision.candidates.map(c => c.physicalId).join(', ')}...`);
        await this.importOrphans(decision.candidates);
        return 'imported';

      case 'DISCARD_THEN_CREATE':
        logger.info(`Deleting orphaned buckets before creating ${stackName}...`);
        await this.reclaimBuckets(decision.candidates.map(c => c.physicalId));
        await this.create();
        return 'created';

      case 'TEARDOWN_THEN_CREATE':
        logger.warn(`Stack ${stackName} failed its initial creation (${resolution.rawStatus ?? 'unknown'}); tearing down before recreating`);
        await this.teardown(resolution);
        await this.create();
        return 'created';

      case 'CONFIRM_ORPHANS':
        throw new Error('Orphan disposition must be chosen before execution');

      case 'FAIL':
        throw await this.failureFor(decision, resolution);
    }
  }

  private async failureFor(
    decision: Extract<TransitionDecision, { type: 'FAIL' }>,
    resolution: StackResolution
  ): Promise<FoundationError> {
    const { stackName } = this.params;
    if (decision.category === 'STATE_CONFLICT') {
      return new StateConflictError(stackName, resolution.rawStatus ?? 'unknown');
    }
    const stuck = await this.stuckResources();
    return new IrrecoverableStateError(
      stackName,
      `Stack '${stackName}' is ${resolution.rawStatus ?? 'in an unrecoverable state'}: ${decision.reason}. ${describeFailures(stuck)}`,
      'Inspect the DELETE_FAILED resources in the CloudFormation console, clean them up, then run destroy.'
    );
  }

  private async stuckResources(): Promise<ResourceFailure[]> {
    const { stackName } = this.params;
    try {
      const resources = await this.gateways.stacks.listStackResources(stackName);
      return resources
        .filter(resource => resource.status === 'DELETE_FAILED')
        .map(resource => ({
          logicalId: resource.logicalId,
          resourceType: resource.resourceType,
          status: resource.status,
          reason: resource.statusReason,
        }));
    } catch (error) {
      logger.verbose(`Could not list resources of ${stackName}: ${errorMessage(error)}`);
      return [];
    }
  }

  private fullRequest(): StackRequest {
    return buildStackRequest(this.params, generateFoundationStackTemplate(this.templateOptions));
  }

  private async create(): Promise<void> {
    ensureNotCancelled(this.signal);
    const since = this.clock();
    await this.gateways.stacks.createStack(this.fullRequest(), { terminationProtection: true });
    await this.waiter.waitFor({ stackName: this.params.stackName, success: ['CREATE_COMPLETE'], since });
  }

  private async update(): Promise<DeploymentOutcome> {
    ensureNotCancelled(this.signal);
    const since = this.clock();
    const result = await this.gateways.stacks.updateStack(this.fullRequest());
    if (result === 'NO_CHANGES') {
      logger.verbose(`Stack ${this.params.stackName} is already up to date`);
      return 'no-changes';
    }
    await this.waiter.waitFor({ stackName: this.params.stackName, success: ['UPDATE_COMPLETE'], since });
    return 'updated';
  }

  /**
   * Adopt orphaned resources in one IMPORT change set, then update to the full template
   */
  private async importOrphans(candidates: OrphanCandidate[]): Promise<void> {
    const { stackName } = this.params;
    const targets = candidates.map(importTargetFor);
    const request = buildStackRequest(
      this.params,
      generateImportTemplate(this.templateOptions, targets.map(t => t.logicalId))
    );
    const changeSetName = `import-${this.clock().getTime()}`;

    ensureNotCancelled(this.signal);
    try {
      await this.gateways.stacks.createImportChangeSet(request, targets, changeSetName, this.signal);
    } catch (error) {
      // An interrupt leaves the change set and placeholder stack for the operator
      ensureNotCancelled(this.signal);
      await this.cleanupFailedImport(changeSetName);
      if (error instanceof FoundationError) throw error;
      throw new PartialFailureError(
        `Import change set ${changeSetName} for ${stackName} failed`,
        [errorMessage(error)],
        'Check that the orphaned buckets still match the template, or deploy with --on-orphans discard.'
      );
    }

    ensureNotCancelled(this.signal);
    const since = this.clock();
    await this.gateways.stacks.executeChangeSet(stackName, changeSetName);
    await this.waiter.waitFor({ stackName, success: ['IMPORT_COMPLETE'], since });

    ensureNotCancelled(this.signal);
    await this.gateways.stacks.setTerminationProtection(stackName, true);
    logger.verbose(`Termination protection re-enabled on ${stackName}`);

    await this.update();
  }

  private async cleanupFailedImport(changeSetName: string): Promise<void> {
    const { stackName } = this.params;
    try {
      await this.gateways.stacks.deleteChangeSet(stackName, changeSetName);
    } catch (error) {
      logger.verbose(`Could not delete change set ${changeSetName}: ${errorMessage(error)}`);
    }

    try {
      const stack = await this.gateways.stacks.describeStack(stackName);
      if (stack?.status === 'REVIEW_IN_PROGRESS') {
        await this.gateways.stacks.deleteStack(stackName);
        logger.verbose(`Deleted placeholder stack ${stackName} left by the failed import`);
      }
    } catch (error) {
      logger.warn(`Could not remove placeholder stack ${stackName}: ${errorMessage(error)}`);
    }
  }

  /**
   * Remove what a failed first creation left behind so the name can be reused
   */
  private async teardown(resolution: StackResolution): Promise<void> {
    const { stackName, accountId, region, identityProvider } = this.params;

    ensureNotCancelled(this.signal);
    if (resolution.stack?.terminationProtection) {
      await this.gateways.stacks.setTerminationProtection(stackName, false);
    }

    const names = foundationResourceNames(accountId, region);
    await this.reclaimBuckets([names.stateBucket, names.logBucket]);

    const hostPath = issuerHostPath(identityProvider.issuerUrl);
    const providers = await this.gateways.identityProviders.listProviderArns();
    for (const arn of providers.filter(candidate => isProviderForIssuer(candidate, hostPath))) {
      ensureNotCancelled(this.signal);
      logger.info(`Deleting leftover OIDC provider ${arn}`);
      await this.gateways.identityProviders.deleteProvider(arn);
    }

    ensureNotCancelled(this.signal);
    const since = this.clock();
    await this.gateways.stacks.deleteStack(stackName);
    await this.waiter.waitFor({ stackName, success: ['DELETE_COMPLETE'], since, absentIsSuccess: true });
  }

  private async reclaimBuckets(bucketNames: string[]): Promise<void> {
    const failures: string[] = [];
    for (const bucket of bucketNames) {
      const result = await this.reclaimer.reclaim(bucket, { deleteBucket: true, signal: this.signal });
      this.reclaimed.push(result);
      for (const failure of result.failures) {
        failures.push(`${bucket}/${failure.key}${failure.versionId ? `@${failure.versionId}` : ''}: ${failure.message}`);
      }
    }
    if (failures.length > 0) {
      throw new PartialFailureError(
        'Could not empty every bucket blocking the new stack',
        failures,
        'Remove the listed object versions manually, then deploy again.'
      );
    }
  }

  /**
   * Read the stack back and check every output downstream consumers rely on
   */
  async verifyOutputs(): Promise<Record<string, string>> {
    const { stackName } = this.params;
    const stack = await this.gateways.stacks.describeStack(stackName);
    if (!stack) {
      throw new PartialFailureError(`Stack ${stackName} is missing after deployment`, []);
    }
    const missing = REQUIRED_OUTPUTS.filter(key => !stack.outputs[key]);
    if (missing.length > 0) {
      throw new PartialFailureError(
        `Stack ${stackName} (${stack.status}) is missing outputs`,
        missing,
        'Compare the deployed template with the current one; an update may not have completed.'
      );
    }
    return stack.outputs;
  }
}

function importTargetFor(candidate: OrphanCandidate): ImportTarget {
  if (!candidate.logicalId || !candidate.resourceType) {
    throw new Error(`${candidate.physicalId} has no template slot to import into`);
  }
  if (candidate.kind !== 'bucket') {
    throw new Error(`Importing ${candidate.kind} resources is not supported (${candidate.physicalId})`);
  }
  return {
    logicalId: candidate.logicalId,
    resourceType: candidate.resourceType,
    identifier: { BucketName: candidate.physicalId },
  };
}
