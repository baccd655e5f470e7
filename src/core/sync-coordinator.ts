import type { RepositoryTarget, SyncAction, SyncTally, TargetResult } from '../config/schema.js';
import { BatchExecutor, type ResultListener } from './batch-executor.js';
import { failure, planSync, type SyncPlan, type TargetRunner } from './target-runner.js';
import { toTargetError } from './errors.js';

export interface SyncOptions {
  /** Fast-forward existing clones. When false, existing directories are skipped. */
  update?: boolean;
  concurrency?: number;
  signal?: AbortSignal;
  onOrderedResult?: ResultListener;
  onResult?: ResultListener;
}

export interface SyncReport {
  results: TargetResult[];
  /** What happened per identifier; absent for targets that failed. */
  actions: Map<string, SyncAction>;
  tally: SyncTally;
}

/**
 * Clone-or-update across a batch. Every local path is inspected up front to
 * choose clone vs update, then the batch runs through BatchExecutor.
 */
export class SyncCoordinator {
  private readonly runner: TargetRunner;
  private readonly executor: BatchExecutor;

  constructor(runner: TargetRunner, executor: BatchExecutor) {
    this.runner = runner;
    this.executor = executor;
  }

  /** Decide clone / update / skip for every target. Inspection failures are kept per target. */
  async plan(targets: readonly RepositoryTarget[], update: boolean): Promise<Map<string, SyncPlan | Error>> {
    const entries = await Promise.all(
      targets.map(async (t): Promise<[string, SyncPlan | Error]> => {
        try {
          return [t.identifier, await planSync(t, update)];
        } catch (err) {
          return [t.identifier, err instanceof Error ? err : new Error(String(err))];
        }
      }),
    );
    return new Map(entries);
  }

  async sync(targets: readonly RepositoryTarget[], options: SyncOptions = {}): Promise<SyncReport> {
    const plans = await this.plan(targets, options.update ?? true);
    const actions = new Map<string, SyncAction>();

    const results = await this.executor.run(
      targets,
      async (target, signal) => {
        const plan = plans.get(target.identifier);
        if (plan === undefined || plan instanceof Error) {
          return failure(target, toTargetError(plan ?? new Error('no sync plan')), 0);
        }
        const { result, outcome } = await this.runner.executeSync(target, plan, signal);
        if (outcome) actions.set(target.identifier, outcome.action);
        return result;
      },
      { concurrency: options.concurrency, signal: options.signal, onOrderedResult: options.onOrderedResult, onResult: options.onResult },
    );

    return { results, actions, tally: tallySync(results, actions) };
  }
}

export function tallySync(results: readonly TargetResult[], actions: ReadonlyMap<string, SyncAction>): SyncTally {
  const tally: SyncTally = { cloned: 0, updated: 0, upToDate: 0, skipped: 0, failed: 0 };
  for (const result of results) {
    const action = actions.get(result.identifier);
    if (!result.succeeded || !action) {
      tally.failed++;
      continue;
    }
    if (action === 'cloned') tally.cloned++;
    else if (action === 'updated') tally.updated++;
    else if (action === 'up-to-date') tally.upToDate++;
    else tally.skipped++;
  }
  return tally;
}
