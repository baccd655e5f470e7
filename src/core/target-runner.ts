import { access, copyFile, readFile, stat } from 'node:fs/promises';
import { dirname, join, relative, isAbsolute, sep } from 'node:path';
import type {
  ExecutionRequest, RepositoryTarget, SyncOutcome, TargetError, TargetResult,
} from '../config/schema.js';
import { ShellCommandExecutor, type CommandExecutor, type CommandRunResult } from './command-executor.js';
import { GitRepositorySyncer, type RepositorySyncer } from './git-operations.js';
import {
  CancelledError, CommandError, FileSystemError, FleetError, TimeoutError,
  errorMessage, toFileSystemError, toTargetError,
} from './errors.js';

/** What a sync must do for one target, decided from the local path before any git runs. */
export type SyncPlan = 'clone' | 'update' | 'skip' | 'not-a-repository';

export interface SyncExecution {
  result: TargetResult;
  outcome?: SyncOutcome;
}

export interface TargetRunnerOptions {
  executor?: CommandExecutor;
  syncer?: RepositorySyncer;
  /** Per-target limit for run-command; the process group is killed when it expires. */
  timeoutMs?: number;
  /** Ask git and test runners to emit color even though output is captured. */
  colorize?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Inspect a target's local path: missing means clone, a git checkout means
 * update (or skip when updates are off), anything else cannot be synced.
 */
export async function planSync(target: RepositoryTarget, update: boolean): Promise<SyncPlan> {
  try {
    const info = await stat(target.localPath);
    if (!info.isDirectory()) return 'not-a-repository';
  } catch (err) {
    const fsError = toFileSystemError(err);
    if (fsError.code === 'NotFound') return 'clone';
    throw fsError;
  }
  try {
    await access(join(target.localPath, '.git'));
  } catch {
    return 'not-a-repository';
  }
  return update ? 'update' : 'skip';
}

/** Environment that makes piped tools keep their colors. */
export function colorEnv(base: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const index = Number.parseInt(base.GIT_CONFIG_COUNT ?? '0', 10) || 0;
  return {
    ...base,
    FORCE_COLOR: '1',
    CLICOLOR_FORCE: '1',
    PY_COLORS: '1',
    GIT_CONFIG_COUNT: String(index + 1),
    [`GIT_CONFIG_KEY_${index}`]: 'color.ui',
    [`GIT_CONFIG_VALUE_${index}`]: 'always',
  };
}

/**
 * Runs one unit of work against one repository and records the outcome.
 * Nothing thrown inside escapes: every path returns a TargetResult with its duration.
 */
export class TargetRunner {
  private executor: CommandExecutor;
  private syncer: RepositorySyncer;
  private timeoutMs: number | undefined;
  private env: NodeJS.ProcessEnv;

  constructor(options: TargetRunnerOptions = {}) {
    this.executor = options.executor ?? new ShellCommandExecutor();
    this.syncer = options.syncer ?? new GitRepositorySyncer();
    this.timeoutMs = options.timeoutMs;
    const env = options.env ?? process.env;
    this.env = options.colorize ? colorEnv(env) : env;
  }

  async execute(target: RepositoryTarget, request: ExecutionRequest, signal?: AbortSignal): Promise<TargetResult> {
    if (request.kind === 'sync') {
      const plan = await this.timed(target, signal, async () => planSync(target, request.update));
      if (typeof plan !== 'string') return plan;
      return (await this.executeSync(target, plan, signal)).result;
    }

    const action = request;
    return this.timed(target, signal, async (elapsed) => {
      switch (action.kind) {
        case 'run-command':
          return this.runCommand(target, action.command, elapsed, signal);
        case 'copy-file':
          return this.copyFile(target, action.source, action.destination, elapsed, signal);
        case 'read-file':
          return this.readFile(target, action.path, elapsed, signal);
      }
    });
  }

  /** Carry out a sync whose plan is already known. */
  async executeSync(target: RepositoryTarget, plan: SyncPlan, signal?: AbortSignal): Promise<SyncExecution> {
    let outcome: SyncOutcome | undefined;
    const result = await this.timed(target, signal, async (elapsed) => {
      outcome = await this.sync(target, plan, signal);
      return success(target, outcome.summary, elapsed());
    });
    return { result, outcome };
  }

  // ─── Operations ────────────────────────────────────────────────────

  private async runCommand(
    target: RepositoryTarget, command: string, elapsed: () => number, signal?: AbortSignal,
  ): Promise<TargetResult> {
    await ensureCheckout(target);

    let run: CommandRunResult;
    try {
      run = await this.executor.run(command, { cwd: target.localPath, env: this.env, timeoutMs: this.timeoutMs, signal });
    } catch (err) {
      throw new CommandError(`could not start "${command}": ${errorMessage(err)}`, { cause: err });
    }

    const result: TargetResult = {
      identifier: target.identifier,
      succeeded: run.exitCode === 0 && !run.timedOut && !run.cancelled,
      exitCode: run.exitCode ?? undefined,
      stdout: run.stdout,
      stderr: run.stderr,
      duration: elapsed(),
    };
    if (run.timedOut) {
      result.error = toTargetError(new TimeoutError(`timed out after ${formatLimit(this.timeoutMs)}`));
    } else if (run.cancelled) {
      result.error = toTargetError(new CancelledError());
    }
    return result;
  }

  private async copyFile(
    target: RepositoryTarget, source: string, destination: string, elapsed: () => number, signal?: AbortSignal,
  ): Promise<TargetResult> {
    await ensureCheckout(target);
    const dest = insideRepository(target, destination);
    const destDir = dirname(dest);

    try {
      const info = await stat(destDir);
      if (!info.isDirectory()) throw new FileSystemError('NotADirectory', `${destDir} is not a directory`);
    } catch (err) {
      const fsError = toFileSystemError(err);
      if (fsError.code === 'NotFound') {
        throw new FileSystemError('NotFound', `destination directory ${destDir} does not exist`, { cause: err });
      }
      throw fsError;
    }

    if (await isSameFile(source, dest)) {
      return success(target, `${dest} (unchanged, same file)`, elapsed());
    }
    if (signal?.aborted) throw new CancelledError();

    try {
      await copyFile(source, dest);
    } catch (err) {
      throw toFileSystemError(err);
    }
    return success(target, dest, elapsed());
  }

  private async readFile(
    target: RepositoryTarget, path: string, elapsed: () => number, signal?: AbortSignal,
  ): Promise<TargetResult> {
    await ensureCheckout(target);
    const file = insideRepository(target, path);
    let content: string;
    try {
      content = await readFile(file, { encoding: 'utf-8', signal });
    } catch (err) {
      if (signal?.aborted) throw new CancelledError();
      const fsError = toFileSystemError(err);
      if (fsError.code === 'NotFound') {
        throw new FileSystemError('NotFound', `${file} does not exist`, { cause: err });
      }
      throw fsError;
    }
    return success(target, content, elapsed());
  }

  private async sync(target: RepositoryTarget, plan: SyncPlan, signal?: AbortSignal): Promise<SyncOutcome> {
    switch (plan) {
      case 'not-a-repository':
        throw new FileSystemError('NotARepository', `${target.localPath} exists but is not a git repository`);
      case 'skip':
        return { action: 'skipped', summary: 'already exists' };
      case 'clone':
        return this.syncer.clone(target.remoteUrl, target.localPath, signal);
      case 'update':
        return this.syncer.fastForward(target.localPath, signal);
    }
  }

  // ─── Timing & failure capture ─────────────────────────────────────

  private async timed<T>(
    target: RepositoryTarget,
    signal: AbortSignal | undefined,
    work: (elapsed: () => number) => Promise<T>,
  ): Promise<T | TargetResult> {
    const started = performance.now();
    const elapsed = (): number => (performance.now() - started) / 1000;
    try {
      return await work(elapsed);
    } catch (err) {
      const error: TargetError = signal?.aborted && !(err instanceof FleetError)
        ? toTargetError(new CancelledError())
        : toTargetError(err);
      return failure(target, error, elapsed());
    }
  }
}

// ─── Helpers ──────────────────────────────────────────────────────

function success(target: RepositoryTarget, stdout: string, duration: number): TargetResult {
  return { identifier: target.identifier, succeeded: true, stdout, stderr: '', duration };
}

export function failure(target: RepositoryTarget, error: TargetError, duration: number): TargetResult {
  return { identifier: target.identifier, succeeded: false, stdout: '', stderr: '', duration, error };
}

/** The repository must already be cloned for run/copy/read. */
async function ensureCheckout(target: RepositoryTarget): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(target.localPath)).isDirectory();
  } catch (err) {
    const fsError = toFileSystemError(err);
    if (fsError.code === 'NotFound') {
      throw new FileSystemError('NotFound', `${target.name} has not been checked out (${target.localPath} missing)`, { cause: err });
    }
    throw fsError;
  }
  if (!isDirectory) throw new FileSystemError('NotADirectory', `${target.localPath} is not a directory`);
}

/** Join a repo-relative path, refusing anything that lands outside the repository. */
function insideRepository(target: RepositoryTarget, path: string): string {
  const full = join(target.localPath, path);
  const rel = relative(target.localPath, full);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new FileSystemError('PermissionDenied', `${path} is outside ${target.name}`);
  }
  return full;
}

async function isSameFile(a: string, b: string): Promise<boolean> {
  try {
    const [sa, sb] = await Promise.all([stat(a), stat(b)]);
    return sa.dev === sb.dev && sa.ino === sb.ino;
  } catch {
    return false;
  }
}

function formatLimit(ms: number | undefined): string {
  return ms === undefined ? 'limit' : `${ms / 1000}s`;
}
