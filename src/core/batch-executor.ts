import { availableParallelism } from 'node:os';
import type { RepositoryTarget, TargetResult } from '../config/schema.js';
import { CancelledError, toTargetError } from './errors.js';
import { failure } from './target-runner.js';

/** One unit of work for one target. May throw; the executor turns that into a failed result. */
export type TargetWork = (target: RepositoryTarget, signal: AbortSignal) => Promise<TargetResult>;

export type ResultListener = (result: TargetResult, index: number) => void;

export interface BatchRunOptions {
  /** Maximum units in flight. Defaults to the executor's default. */
  concurrency?: number;
  /** Aborting stops queued targets and signals in-flight ones. */
  signal?: AbortSignal;
  /** Called as each target finishes, in completion order. */
  onResult?: ResultListener;
  /** Called in target order, as soon as every earlier target has finished. */
  onOrderedResult?: ResultListener;
}

export function defaultConcurrency(): number {
  return availableParallelism();
}

function validateConcurrency(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Releases results in target order while accepting them in completion order.
 */
class OrderedEmitter {
  private pending = new Map<number, TargetResult>();
  private next = 0;

  constructor(private readonly listener: ResultListener | undefined) {}

  push(index: number, result: TargetResult): void {
    if (!this.listener) return;
    this.pending.set(index, result);
    let ready = this.pending.get(this.next);
    while (ready) {
      this.pending.delete(this.next);
      this.listener(ready, this.next);
      this.next++;
      ready = this.pending.get(this.next);
    }
  }
}

/**
 * Runs the same unit of work across many targets with bounded concurrency.
 *
 * Every target yields exactly one result, in target order, whatever happens
 * to the others: thrown errors become failed results, and after cancellation
 * targets that never started are reported as cancelled.
 */
export class BatchExecutor {
  private readonly concurrency: number;

  constructor(options: { concurrency?: number } = {}) {
    this.concurrency = validateConcurrency(options.concurrency ?? defaultConcurrency());
  }

  async run(targets: readonly RepositoryTarget[], work: TargetWork, options: BatchRunOptions = {}): Promise<TargetResult[]> {
    const limit = validateConcurrency(options.concurrency ?? this.concurrency);
    const results = new Map<number, TargetResult>();
    const emitter = new OrderedEmitter(options.onOrderedResult);

    const controller = new AbortController();
    const parent = options.signal;
    const forwardAbort = (): void => controller.abort(parent?.reason);
    if (parent?.aborted) forwardAbort();
    else parent?.addEventListener('abort', forwardAbort, { once: true });

    let cursor = 0;
    const worker = async (): Promise<void> => {
      while (cursor < targets.length) {
        const index = cursor++;
        const target = targets[index];
        const result = controller.signal.aborted
          ? cancelled(target)
          : await this.runOne(target, work, controller.signal);
        results.set(index, result);
        options.onResult?.(result, index);
        emitter.push(index, result);
      }
    };

    try {
      const workers = Array.from({ length: Math.min(limit, targets.length) }, () => worker());
      await Promise.all(workers);
    } finally {
      parent?.removeEventListener('abort', forwardAbort);
    }

    return targets.map((target, index) => results.get(index) ?? cancelled(target));
  }

  private async runOne(target: RepositoryTarget, work: TargetWork, signal: AbortSignal): Promise<TargetResult> {
    const started = performance.now();
    try {
      return await work(target, signal);
    } catch (err) {
      return failure(target, toTargetError(err), (performance.now() - started) / 1000);
    }
  }
}

function cancelled(target: RepositoryTarget): TargetResult {
  return failure(target, toTargetError(new CancelledError('Cancelled before start')), 0);
}
