import type { BatchReport, BatchTiming, ExecutionRequest, TargetResult } from '../config/schema.js';

/** Human-readable label for a request, shown in the statistics block. */
export function describeRequest(request: ExecutionRequest): string {
  switch (request.kind) {
    case 'sync':
      return request.update ? 'clone or update' : 'clone missing';
    case 'run-command':
      return request.command;
    case 'copy-file':
      return `copy ${request.source} → ${request.destination}`;
    case 'read-file':
      return `show ${request.path}`;
  }
}

/** Verbose mode: results go to presentation untouched, in target order. */
export function passThrough(results: readonly TargetResult[]): readonly TargetResult[] {
  return results;
}

/**
 * Reduce a completed batch to pass/fail counts and timing statistics.
 * Timing covers every result, passing or not. An empty batch reports zeros.
 */
export function summarize(results: readonly TargetResult[], description: string): BatchReport {
  const passing = results.filter((r) => r.succeeded).length;
  return {
    description,
    results: [...results],
    counts: { passing, failing: results.length - passing },
    timing: computeTiming(results.map((r) => r.duration)),
  };
}

function computeTiming(durations: number[]): BatchTiming {
  if (durations.length === 0) return { min: 0, max: 0, average: 0 };
  let min = Infinity;
  let max = -Infinity;
  let total = 0;
  for (const d of durations) {
    if (d < min) min = d;
    if (d > max) max = d;
    total += d;
  }
  // mean can drift a ulp outside [min, max] when all durations are equal
  const average = Math.min(max, Math.max(min, total / durations.length));
  return { min, max, average };
}

/** Process exit code: 1 when any target failed, otherwise 0. */
export function exitCodeFor(results: readonly TargetResult[]): number {
  return results.some((r) => !r.succeeded) ? 1 : 0;
}
