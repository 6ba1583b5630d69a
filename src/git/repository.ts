/**
 * Read-only git queries against the working directory
 */

import { execFile as execFileCb } from 'node:child_process';
import { promisify } from 'node:util';

const execFile = promisify(execFileCb);

const GIT_TIMEOUT_MS = 15_000;

export interface GitResult {
  ok: boolean;
  stdout: string;
  stderr: string;
}

/**
 * Runs git with the given arguments; never throws for a non-zero exit
 */
export type GitRunner = (args: string[]) => Promise<GitResult>;

export function createGitRunner(cwd: string = process.cwd()): GitRunner {
  return async args => {
    try {
      const { stdout, stderr } = await execFile('git', args, { cwd, timeout: GIT_TIMEOUT_MS });
      return { ok: true, stdout: stdout.trim(), stderr: stderr.trim() };
    } catch (error) {
      const stderr = error instanceof Error && 'stderr' in error && typeof error.stderr === 'string'
        ? error.stderr
        : error instanceof Error ? error.message : String(error);
      return { ok: false, stdout: '', stderr: stderr.trim() };
    }
  };
}

export class GitRepository {
  constructor(private readonly git: GitRunner = createGitRunner()) {}

  /** `git --version`, or null when git cannot be run */
  async version(): Promise<string | null> {
    const result = await this.git(['--version']);
    return result.ok ? result.stdout : null;
  }

  async isRepository(): Promise<boolean> {
    return (await this.git(['rev-parse', '--git-dir'])).ok;
  }

  async remoteUrl(remote: string = 'origin'): Promise<string | null> {
    const result = await this.git(['remote', 'get-url', remote]);
    return result.ok && result.stdout ? result.stdout : null;
  }

  async hasUncommittedChanges(): Promise<boolean> {
    return !(await this.git(['diff-index', '--quiet', 'HEAD', '--'])).ok;
  }

  async untrackedFiles(): Promise<string[]> {
    const result = await this.git(['ls-files', '--others', '--exclude-standard']);
    return result.ok ? result.stdout.split('\n').filter(line => line.length > 0) : [];
  }

  async isDetachedHead(): Promise<boolean> {
    return !(await this.git(['symbolic-ref', '-q', 'HEAD'])).ok;
  }

  async upstream(): Promise<string | null> {
    const result = await this.git(['rev-parse', '--abbrev-ref', '@{u}']);
    return result.ok ? result.stdout : null;
  }

  /** Commits on HEAD that the upstream does not have; null without an upstream */
  async unpushedCommitCount(): Promise<number | null> {
    const result = await this.git(['rev-list', '--count', '@{u}..HEAD']);
    if (!result.ok) {
      return null;
    }
    const count = Number.parseInt(result.stdout, 10);
    return Number.isNaN(count) ? null : count;
  }
}
