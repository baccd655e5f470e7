import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ShellCommandExecutor } from '../../src/core/command-executor.js';

describe.skipIf(process.platform === 'win32')('ShellCommandExecutor', () => {
  let cwd: string;
  const executor = new ShellCommandExecutor();

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'classfleet-exec-'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it('captures stdout, stderr and the exit code', async () => {
    const result = await executor.run('echo out; echo err >&2; exit 3', { cwd });
    expect(result).toEqual({ exitCode: 3, stdout: 'out\n', stderr: 'err\n', timedOut: false, cancelled: false });
  });

  it('runs in the given directory', async () => {
    const result = await executor.run('pwd -P', { cwd });
    expect(result.exitCode).toBe(0);
    expect(result.stdout.trim().endsWith(cwd.split('/').pop() ?? '')).toBe(true);
  });

  it('passes the environment through', async () => {
    const result = await executor.run('printf %s "$FLEET_TEST_VALUE"', { cwd, env: { ...process.env, FLEET_TEST_VALUE: 'hello' } });
    expect(result.stdout).toBe('hello');
  });

  it('kills the process group on timeout and keeps partial output', async () => {
    const started = Date.now();
    const result = await executor.run('echo started; sleep 30; echo never', { cwd, timeoutMs: 200 });
    expect(result.timedOut).toBe(true);
    expect(result.cancelled).toBe(false);
    expect(result.exitCode).toBeNull();
    expect(result.stdout).toBe('started\n');
    expect(Date.now() - started).toBeLessThan(10_000);
  });

  it('kills background jobs left behind by the shell on timeout', async () => {
    const started = Date.now();
    const result = await executor.run('echo hi; sleep 30 &', { cwd, timeoutMs: 300 });
    expect(result.timedOut).toBe(true);
    expect(result.stdout).toBe('hi\n');
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it('kills background jobs left behind by the shell on abort', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 300);
    const started = Date.now();
    const result = await executor.run('echo hi; sleep 30 &', { cwd, signal: controller.signal });
    expect(result.cancelled).toBe(true);
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it('stops when the signal aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);
    const result = await executor.run('sleep 30', { cwd, signal: controller.signal });
    expect(result.cancelled).toBe(true);
    expect(result.timedOut).toBe(false);
  });

  it('does not start work for an already-aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await executor.run('sleep 30', { cwd, signal: controller.signal });
    expect(result.cancelled).toBe(true);
  });
});
