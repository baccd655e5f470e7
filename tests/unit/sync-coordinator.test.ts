import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SyncCoordinator, tallySync } from '../../src/core/sync-coordinator.js';
import { TargetRunner } from '../../src/core/target-runner.js';
import { BatchExecutor } from '../../src/core/batch-executor.js';
import type { RepositorySyncer } from '../../src/core/git-operations.js';
import type { RepositoryTarget, SyncAction, TargetResult } from '../../src/config/schema.js';
import { SyncConflictError } from '../../src/core/errors.js';

describe('SyncCoordinator', () => {
  let workdir: string;
  let syncer: RepositorySyncer;
  let coordinator: SyncCoordinator;

  const target = (id: string): RepositoryTarget => ({
    identifier: id,
    name: `hw1-${id}`,
    remoteUrl: `git@github.com:cs101-fall/hw1-${id}.git`,
    localPath: join(workdir, `hw1-${id}`),
  });

  beforeEach(() => {
    workdir = mkdtempSync(join(tmpdir(), 'classfleet-sync-'));
    // a clone leaves a checkout behind, so a second sync sees it
    syncer = {
      clone: vi.fn(async (_url: string, localPath: string) => {
        mkdirSync(join(localPath, '.git'), { recursive: true });
        return { action: 'cloned' as const, summary: 'cloned' };
      }),
      fastForward: vi.fn(async () => ({ action: 'up-to-date' as const, summary: 'main already at 0123abcd' })),
    };
    coordinator = new SyncCoordinator(new TargetRunner({ syncer }), new BatchExecutor({ concurrency: 2 }));
  });

  afterEach(() => {
    rmSync(workdir, { recursive: true, force: true });
  });

  it('plans clone, update and not-a-repository from the local paths', async () => {
    mkdirSync(join(workdir, 'hw1-bob', '.git'), { recursive: true });
    mkdirSync(join(workdir, 'hw1-carol'));
    const plans = await coordinator.plan([target('alice'), target('bob'), target('carol')], true);
    expect([...plans.entries()]).toEqual([['alice', 'clone'], ['bob', 'update'], ['carol', 'not-a-repository']]);
  });

  it('clones missing repositories and updates existing ones', async () => {
    mkdirSync(join(workdir, 'hw1-bob', '.git'), { recursive: true });
    const report = await coordinator.sync([target('alice'), target('bob')]);

    expect(report.results.map((r) => r.succeeded)).toEqual([true, true]);
    expect([...report.actions.entries()]).toEqual(expect.arrayContaining([['alice', 'cloned'], ['bob', 'up-to-date']]));
    expect(report.tally).toEqual({ cloned: 1, updated: 0, upToDate: 1, skipped: 0, failed: 0 });
    expect(syncer.clone).toHaveBeenCalledTimes(1);
    expect(syncer.fastForward).toHaveBeenCalledTimes(1);
  });

  it('does not clone again on a second run', async () => {
    const targets = [target('alice'), target('bob')];
    await coordinator.sync(targets);
    const second = await coordinator.sync(targets);

    expect(syncer.clone).toHaveBeenCalledTimes(2);
    expect(second.tally).toEqual({ cloned: 0, updated: 0, upToDate: 2, skipped: 0, failed: 0 });
  });

  it('skips existing checkouts when updates are off', async () => {
    mkdirSync(join(workdir, 'hw1-bob', '.git'), { recursive: true });
    const report = await coordinator.sync([target('alice'), target('bob')], { update: false });
    expect(report.tally).toEqual({ cloned: 1, updated: 0, upToDate: 0, skipped: 1, failed: 0 });
    expect(syncer.fastForward).not.toHaveBeenCalled();
  });

  it('records per-target failures without stopping the batch', async () => {
    mkdirSync(join(workdir, 'hw1-bob', '.git'), { recursive: true });
    mkdirSync(join(workdir, 'hw1-carol'));
    vi.mocked(syncer.fastForward).mockRejectedValueOnce(new SyncConflictError('main has diverged from origin/main'));

    const report = await coordinator.sync([target('alice'), target('bob'), target('carol')]);

    expect(report.results.map((r) => r.succeeded)).toEqual([true, false, false]);
    expect(report.results[1].error).toEqual({ kind: 'SyncConflictError', message: 'main has diverged from origin/main' });
    expect(report.results[2].error?.code).toBe('NotARepository');
    expect(report.tally.failed).toBe(2);
    expect(report.actions.has('bob')).toBe(false);
  });

  it('passes ordered results to the listener', async () => {
    const seen: string[] = [];
    await coordinator.sync([target('alice'), target('bob')], { onOrderedResult: (r) => seen.push(r.identifier) });
    expect(seen).toEqual(['alice', 'bob']);
  });
});

describe('tallySync', () => {
  const ok = (identifier: string): TargetResult => ({ identifier, succeeded: true, stdout: '', stderr: '', duration: 0 });

  it('counts results without an action as failed', () => {
    const actions = new Map<string, SyncAction>([['a', 'updated'], ['b', 'skipped']]);
    expect(tallySync([ok('a'), ok('b'), ok('c')], actions)).toEqual({ cloned: 0, updated: 1, upToDate: 0, skipped: 1, failed: 1 });
  });
});
