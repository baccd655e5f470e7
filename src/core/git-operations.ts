import { simpleGit, type SimpleGit } from 'simple-git';
import type { SyncOutcome } from '../config/schema.js';
import { SyncConflictError, TransportError, errorMessage } from './errors.js';

/**
 * Clone-or-update transport for one repository at a time.
 * SyncCoordinator decides which of the two to call.
 */
export interface RepositorySyncer {
  clone(remoteUrl: string, localPath: string, signal?: AbortSignal): Promise<SyncOutcome>;
  fastForward(localPath: string, signal?: AbortSignal): Promise<SyncOutcome>;
}

/**
 * Low-level git operations for a single repository.
 * Wraps simple-git; the abort signal kills the running git process.
 */
export class GitOperations {
  private git: SimpleGit;

  constructor(repoPath: string, signal?: AbortSignal) {
    this.git = simpleGit({ baseDir: repoPath, abort: signal });
  }

  static async clone(remoteUrl: string, localPath: string, signal?: AbortSignal): Promise<void> {
    await simpleGit({ abort: signal }).clone(remoteUrl, localPath);
  }

  // ─── State Inspection ──────────────────────────────────────────────

  async getCurrentBranch(): Promise<string> {
    const status = await this.git.status();
    return status.current ?? 'HEAD';
  }

  /** Branch that origin/HEAD points at, falling back to the checked-out branch. */
  async getDefaultBranch(remote = 'origin'): Promise<string> {
    try {
      const ref = (await this.git.raw(['symbolic-ref', '--short', `refs/remotes/${remote}/HEAD`])).trim();
      if (ref.startsWith(`${remote}/`)) return ref.slice(remote.length + 1);
    } catch {
      // origin/HEAD is not set for repos that were not created by clone
    }
    return this.getCurrentBranch();
  }

  async revParse(ref: string): Promise<string> {
    return (await this.git.revparse([ref])).trim();
  }

  /** Common ancestor of two commits, or null when the histories are unrelated. */
  async mergeBase(a: string, b: string): Promise<string | null> {
    try {
      const base = (await this.git.raw(['merge-base', a, b])).trim();
      return base.length > 0 ? base : null;
    } catch {
      return null;
    }
  }

  // ─── Remote ────────────────────────────────────────────────────────

  async fetch(remote = 'origin'): Promise<void> {
    await this.git.fetch(remote, { '--prune': null });
  }

  async mergeFastForward(ref: string): Promise<void> {
    await this.git.merge(['--ff-only', ref]);
  }
}

/** RepositorySyncer backed by the local git binary. */
export class GitRepositorySyncer implements RepositorySyncer {
  private remote: string;

  constructor(remote = 'origin') {
    this.remote = remote;
  }

  async clone(remoteUrl: string, localPath: string, signal?: AbortSignal): Promise<SyncOutcome> {
    try {
      await GitOperations.clone(remoteUrl, localPath, signal);
    } catch (err) {
      throw new TransportError(`git clone ${remoteUrl} failed: ${errorMessage(err)}`, { cause: err });
    }
    return { action: 'cloned', summary: `cloned ${remoteUrl}` };
  }

  async fastForward(localPath: string, signal?: AbortSignal): Promise<SyncOutcome> {
    const git = new GitOperations(localPath, signal);

    try {
      await git.fetch(this.remote);
    } catch (err) {
      throw new TransportError(`git fetch ${this.remote} failed: ${errorMessage(err)}`, { cause: err });
    }

    const branch = await git.getDefaultBranch(this.remote);
    const current = await git.getCurrentBranch();
    if (current !== branch) {
      throw new SyncConflictError(`checked out on "${current}", expected default branch "${branch}"`);
    }

    const tracking = `${this.remote}/${branch}`;
    const local = await git.revParse('HEAD');
    const upstream = await git.revParse(tracking);
    if (local === upstream) {
      return { action: 'up-to-date', summary: `${branch} already at ${local.substring(0, 8)}` };
    }

    const base = await git.mergeBase(local, upstream);
    if (base === upstream) {
      return { action: 'up-to-date', summary: `${branch} is ahead of ${tracking}` };
    }
    if (base !== local) {
      throw new SyncConflictError(`${branch} has diverged from ${tracking}; fast-forward not possible`);
    }

    try {
      await git.mergeFastForward(tracking);
    } catch (err) {
      throw new SyncConflictError(`fast-forward of ${branch} failed: ${errorMessage(err)}`, { cause: err });
    }
    return { action: 'updated', summary: `${branch} ${local.substring(0, 8)}..${upstream.substring(0, 8)}` };
  }
}
