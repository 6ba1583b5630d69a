/**
 * Checks that must pass before anything is mutated
 *
 * Every check runs even after an earlier one fails, so a single `verify`
 * shows the whole picture.
 */

import type { GitRepository } from '../git/repository.js';
import type { PermissionProbe } from '../aws/permissions.js';
import { PreconditionError, errorMessage } from '../utils/errors.js';

export type PrerequisiteReason =
  | 'not-a-repository'
  | 'repository-dirty'
  | 'detached-head'
  | 'no-upstream'
  | 'unpushed-commits'
  | 'missing-tool'
  | 'unauthenticated'
  | 'insufficient-permissions';

export interface PrerequisiteFailure {
  reason: PrerequisiteReason;
  message: string;
}

export interface PrerequisiteCheck {
  name: string;
  passed: boolean;
  detail?: string;
}

export interface PrerequisiteReport {
  ready: boolean;
  failures: PrerequisiteFailure[];
  checks: PrerequisiteCheck[];
}

export interface PrerequisiteDependencies {
  git: GitRepository;
  /** Resolves the caller's ARN; rejects when no usable credentials exist */
  authenticate: () => Promise<string>;
  permissionProbes: PermissionProbe[];
}

export async function validatePrerequisites(deps: PrerequisiteDependencies): Promise<PrerequisiteReport> {
  const checks: PrerequisiteCheck[] = [];
  const failures: PrerequisiteFailure[] = [];

  const record = (name: string, failure: PrerequisiteFailure | null, detail?: string): void => {
    checks.push({ name, passed: failure === null, detail: failure?.message ?? detail });
    if (failure) failures.push(failure);
  };

  const version = await deps.git.version();
  record('git installed', version ? null : { reason: 'missing-tool', message: 'git is not installed or not on PATH' }, version ?? undefined);

  if (version) {
    await checkRepository(deps.git, record);
  }

  let authenticated = false;
  try {
    const arn = await deps.authenticate();
    authenticated = true;
    record('AWS authentication', null, arn);
  } catch (error) {
    record('AWS authentication', { reason: 'unauthenticated', message: `AWS authentication failed: ${errorMessage(error)}` });
  }

  // Permission probes are meaningless without credentials
  if (authenticated) {
    for (const probe of deps.permissionProbes) {
      try {
        await probe.run();
        record(probe.name, null);
      } catch (error) {
        record(probe.name, {
          reason: 'insufficient-permissions',
          message: `${probe.name} denied: ${errorMessage(error)}`,
        });
      }
    }
  }

  return { ready: failures.length === 0, failures, checks };
}

type Recorder = (name: string, failure: PrerequisiteFailure | null, detail?: string) => void;

async function checkRepository(git: GitRepository, record: Recorder): Promise<void> {
  if (!(await git.isRepository())) {
    record('git repository', { reason: 'not-a-repository', message: 'Current directory is not inside a git repository' });
    return;
  }
  const remote = await git.remoteUrl();
  record('git repository', null, remote ?? undefined);

  record(
    'no uncommitted changes',
    (await git.hasUncommittedChanges())
      ? { reason: 'repository-dirty', message: 'Repository has uncommitted changes' }
      : null
  );

  const untracked = await git.untrackedFiles();
  record(
    'no untracked files',
    untracked.length > 0
      ? { reason: 'repository-dirty', message: `Repository has ${untracked.length} untracked file(s): ${untracked.slice(0, 5).join(', ')}` }
      : null
  );

  if (await git.isDetachedHead()) {
    record('on a branch', { reason: 'detached-head', message: 'HEAD is detached; check out a branch' });
    return;
  }
  record('on a branch', null);

  const upstream = await git.upstream();
  if (!upstream) {
    record('upstream configured', { reason: 'no-upstream', message: 'Current branch has no upstream; push it with --set-upstream' });
    return;
  }
  record('upstream configured', null, upstream);

  const unpushed = await git.unpushedCommitCount();
  record(
    'no unpushed commits',
    unpushed !== null && unpushed > 0
      ? { reason: 'unpushed-commits', message: `${unpushed} commit(s) not pushed to ${upstream}` }
      : null
  );
}

/**
 * @throws PreconditionError listing every failed reason
 */
export function assertReady(report: PrerequisiteReport): void {
  if (!report.ready) {
    throw new PreconditionError([...new Set(report.failures.map(failure => failure.reason))]);
  }
}
