import { InvalidArgumentError, type Command } from 'commander';
import chalk from 'chalk';
import { SettingsManager } from '../config/settings.js';
import type { Settings } from '../config/schema.js';
import { GitHubClient } from '../github/client.js';
import { RepositorySet, ALL_TARGETS, type TargetSelection } from '../core/repository-set.js';
import { BatchExecutor } from '../core/batch-executor.js';
import { TargetRunner } from '../core/target-runner.js';
import { ReportRenderer } from '../ui/report.js';
import { logger } from '../utils/logger.js';

export interface BatchCliOptions {
  concurrency?: number;
  timeout?: number;
}

export interface CommandContext {
  settings: Readonly<Settings>;
  repositories: RepositorySet;
  runner: TargetRunner;
  executor: BatchExecutor;
  renderer: ReportRenderer;
}

// ─── Option parsing ─────────────────────────────────────────────────

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

export function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('must be a positive number');
  return n;
}

/** -j/--concurrency and, for command runners, -t/--timeout. */
export function addBatchOptions(command: Command, options: { timeout?: boolean } = {}): Command {
  command.option('-j, --concurrency <n>', 'Repositories processed at once (default: CPU count)', parsePositiveInt);
  if (options.timeout) {
    command.option('-t, --timeout <seconds>', 'Stop a repository\'s command after this many seconds', parsePositiveNumber);
  }
  return command;
}

/** No student names means every local clone of the assignment. */
export function selectionFrom(students: string[]): TargetSelection {
  return students.length > 0 ? students : ALL_TARGETS;
}

// ─── Context ────────────────────────────────────────────────────────

/**
 * Load settings and wire the batch pipeline for one assignment.
 * A GitHub client is only created when the command lists remote repositories.
 */
export function createContext(assignment: string, options: BatchCliOptions & { remote?: boolean } = {}): CommandContext {
  const settings = new SettingsManager().load();
  const lister = options.remote ? GitHubClient.create(settings) : undefined;
  const repositories = new RepositorySet(SettingsManager.selectorFor(settings, assignment), lister);

  const timeoutSeconds = options.timeout ?? settings.command_timeout_seconds;
  const runner = new TargetRunner({
    timeoutMs: timeoutSeconds === undefined ? undefined : timeoutSeconds * 1000,
    colorize: chalk.level > 0,
  });
  const executor = new BatchExecutor({ concurrency: options.concurrency ?? settings.concurrency });

  logger.verbose(`organization ${settings.organization}, working dir ${settings.working_dir}`);
  if (timeoutSeconds !== undefined) logger.verbose(`timeout ${timeoutSeconds}s per repository`);

  return { settings, repositories, runner, executor, renderer: new ReportRenderer() };
}

// ─── Interrupts & errors ─────────────────────────────────────────────

/**
 * First Ctrl-C aborts the batch (running commands are terminated, finished
 * results are kept); a second one exits immediately.
 */
export function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) process.exit(130);
    logger.warn('Interrupted, stopping running commands (Ctrl-C again to exit now)');
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);
  return { signal: controller.signal, dispose: () => process.off('SIGINT', onInterrupt) };
}

/** Fatal errors print one red message and set exit code 1; no partial report. */
export function withErrorHandling<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      logger.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  };
}
