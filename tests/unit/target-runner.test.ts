import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TargetRunner, planSync, colorEnv } from '../../src/core/target-runner.js';
import type { CommandExecutor, CommandRunResult } from '../../src/core/command-executor.js';
import type { RepositorySyncer } from '../../src/core/git-operations.js';
import type { RepositoryTarget } from '../../src/config/schema.js';
import { TransportError } from '../../src/core/errors.js';

function fakeExecutor(result: Partial<CommandRunResult>): CommandExecutor {
  return {
    run: vi.fn(async () => ({ exitCode: 0, stdout: '', stderr: '', timedOut: false, cancelled: false, ...result })),
  };
}

function fakeSyncer(): RepositorySyncer {
  return {
    clone: vi.fn(async (url: string) => ({ action: 'cloned' as const, summary: `cloned ${url}` })),
    fastForward: vi.fn(async () => ({ action: 'updated' as const, summary: 'main abc..def' })),
  };
}

describe('TargetRunner', () => {
  let workdir: string;
  let target: RepositoryTarget;

  beforeEach(() => {
    workdir = mkdtempSync(join(tmpdir(), 'classfleet-runner-'));
    target = {
      identifier: 'alice',
      name: 'hw1-alice',
      remoteUrl: 'git@github.com:cs101-fall/hw1-alice.git',
      localPath: join(workdir, 'hw1-alice'),
    };
  });

  afterEach(() => {
    rmSync(workdir, { recursive: true, force: true });
  });

  describe('run-command', () => {
    it('succeeds on exit code 0 and keeps output', async () => {
      mkdirSync(target.localPath);
      const executor = fakeExecutor({ exitCode: 0, stdout: 'ok\n', stderr: 'warn\n' });
      const runner = new TargetRunner({ executor, timeoutMs: 5000, env: { PATH: '/bin' } });

      const result = await runner.execute(target, { kind: 'run-command', command: 'make test' });

      expect(result).toMatchObject({ identifier: 'alice', succeeded: true, exitCode: 0, stdout: 'ok\n', stderr: 'warn\n' });
      expect(result.error).toBeUndefined();
      expect(result.duration).toBeGreaterThanOrEqual(0);
      expect(executor.run).toHaveBeenCalledWith('make test', {
        cwd: target.localPath,
        env: { PATH: '/bin' },
        timeoutMs: 5000,
        signal: undefined,
      });
    });

    it('fails on a non-zero exit code without an error', async () => {
      mkdirSync(target.localPath);
      const runner = new TargetRunner({ executor: fakeExecutor({ exitCode: 2, stderr: 'boom\n' }) });
      const result = await runner.execute(target, { kind: 'run-command', command: 'false' });
      expect(result.succeeded).toBe(false);
      expect(result.exitCode).toBe(2);
      expect(result.error).toBeUndefined();
    });

    it('records a timeout with the partial output', async () => {
      mkdirSync(target.localPath);
      const executor = fakeExecutor({ exitCode: null, stdout: 'half', timedOut: true });
      const result = await new TargetRunner({ executor, timeoutMs: 1500 }).execute(target, { kind: 'run-command', command: 'slow' });
      expect(result.succeeded).toBe(false);
      expect(result.exitCode).toBeUndefined();
      expect(result.stdout).toBe('half');
      expect(result.error).toEqual({ kind: 'TimeoutError', message: 'timed out after 1.5s' });
    });

    it('records cancellation', async () => {
      mkdirSync(target.localPath);
      const executor = fakeExecutor({ exitCode: null, cancelled: true });
      const result = await new TargetRunner({ executor }).execute(target, { kind: 'run-command', command: 'slow' });
      expect(result.error).toEqual({ kind: 'CancelledError', message: 'Cancelled' });
    });

    it('turns a spawn failure into a CommandError', async () => {
      mkdirSync(target.localPath);
      const executor: CommandExecutor = { run: vi.fn(async () => { throw new Error('spawn EAGAIN'); }) };
      const result = await new TargetRunner({ executor }).execute(target, { kind: 'run-command', command: 'x' });
      expect(result.error).toEqual({ kind: 'CommandError', message: 'could not start "x": spawn EAGAIN' });
    });

    it('reports a repository that was never checked out', async () => {
      const executor = fakeExecutor({});
      const result = await new TargetRunner({ executor }).execute(target, { kind: 'run-command', command: 'ls' });
      expect(result.succeeded).toBe(false);
      expect(result.error?.kind).toBe('FileSystemError');
      expect(result.error?.code).toBe('NotFound');
      expect(executor.run).not.toHaveBeenCalled();
    });

    it('forces color in the environment when asked', async () => {
      mkdirSync(target.localPath);
      const executor = fakeExecutor({});
      await new TargetRunner({ executor, colorize: true, env: {} }).execute(target, { kind: 'run-command', command: 'ls' });
      expect(executor.run).toHaveBeenCalledWith('ls', expect.objectContaining({
        env: expect.objectContaining({ FORCE_COLOR: '1', GIT_CONFIG_KEY_0: 'color.ui', GIT_CONFIG_VALUE_0: 'always' }),
      }));
    });
  });

  describe('copy-file', () => {
    let source: string;

    beforeEach(() => {
      source = join(workdir, 'Makefile.new');
      writeFileSync(source, 'all:\n\ttrue\n');
    });

    it('copies into an existing directory', async () => {
      mkdirSync(join(target.localPath, 'build'), { recursive: true });
      const result = await new TargetRunner().execute(target, { kind: 'copy-file', source, destination: 'build/Makefile' });
      expect(result.succeeded).toBe(true);
      expect(readFileSync(join(target.localPath, 'build', 'Makefile'), 'utf-8')).toBe('all:\n\ttrue\n');
    });

    it('fails when the destination directory is missing', async () => {
      mkdirSync(target.localPath);
      const result = await new TargetRunner().execute(target, { kind: 'copy-file', source, destination: 'build/Makefile' });
      expect(result.succeeded).toBe(false);
      expect(result.error).toEqual({
        kind: 'FileSystemError',
        code: 'NotFound',
        message: `destination directory ${join(target.localPath, 'build')} does not exist`,
      });
    });

    it('treats copying a file onto itself as success', async () => {
      mkdirSync(target.localPath);
      const inside = join(target.localPath, 'README.md');
      writeFileSync(inside, 'hello');
      const result = await new TargetRunner().execute(target, { kind: 'copy-file', source: inside, destination: 'README.md' });
      expect(result.succeeded).toBe(true);
      expect(result.stdout).toBe(`${inside} (unchanged, same file)`);
      expect(readFileSync(inside, 'utf-8')).toBe('hello');
    });

    it('refuses destinations outside the repository', async () => {
      mkdirSync(target.localPath);
      const result = await new TargetRunner().execute(target, { kind: 'copy-file', source, destination: '../escape' });
      expect(result.error?.code).toBe('PermissionDenied');
    });
  });

  describe('read-file', () => {
    it('returns the file content as stdout', async () => {
      mkdirSync(target.localPath);
      writeFileSync(join(target.localPath, 'answers.txt'), '42\n');
      const result = await new TargetRunner().execute(target, { kind: 'read-file', path: 'answers.txt' });
      expect(result.succeeded).toBe(true);
      expect(result.stdout).toBe('42\n');
    });

    it('reads files whose names start with two dots', async () => {
      mkdirSync(target.localPath);
      writeFileSync(join(target.localPath, '..notes'), 'draft\n');
      const result = await new TargetRunner().execute(target, { kind: 'read-file', path: '..notes' });
      expect(result).toMatchObject({ succeeded: true, stdout: 'draft\n' });
    });

    it('refuses paths that climb out of the repository', async () => {
      mkdirSync(target.localPath);
      const result = await new TargetRunner().execute(target, { kind: 'read-file', path: '../../etc/passwd' });
      expect(result.error).toEqual({
        kind: 'FileSystemError',
        code: 'PermissionDenied',
        message: '../../etc/passwd is outside hw1-alice',
      });
    });

    it('reports a missing file as NotFound', async () => {
      mkdirSync(target.localPath);
      const result = await new TargetRunner().execute(target, { kind: 'read-file', path: 'answers.txt' });
      expect(result.error).toEqual({
        kind: 'FileSystemError',
        code: 'NotFound',
        message: `${join(target.localPath, 'answers.txt')} does not exist`,
      });
    });

    it('reports reading a directory as IsADirectory', async () => {
      mkdirSync(join(target.localPath, 'src'), { recursive: true });
      const result = await new TargetRunner().execute(target, { kind: 'read-file', path: 'src' });
      expect(result.error?.code).toBe('IsADirectory');
    });
  });

  describe('sync', () => {
    it('clones a missing repository', async () => {
      const syncer = fakeSyncer();
      const result = await new TargetRunner({ syncer }).execute(target, { kind: 'sync', update: true });
      expect(result.succeeded).toBe(true);
      expect(result.stdout).toBe(`cloned ${target.remoteUrl}`);
      expect(syncer.clone).toHaveBeenCalledWith(target.remoteUrl, target.localPath, undefined);
    });

    it('fast-forwards an existing checkout', async () => {
      mkdirSync(join(target.localPath, '.git'), { recursive: true });
      const syncer = fakeSyncer();
      const result = await new TargetRunner({ syncer }).execute(target, { kind: 'sync', update: true });
      expect(result.stdout).toBe('main abc..def');
      expect(syncer.fastForward).toHaveBeenCalledWith(target.localPath, undefined);
      expect(syncer.clone).not.toHaveBeenCalled();
    });

    it('skips an existing checkout when updates are off', async () => {
      mkdirSync(join(target.localPath, '.git'), { recursive: true });
      const syncer = fakeSyncer();
      const result = await new TargetRunner({ syncer }).execute(target, { kind: 'sync', update: false });
      expect(result).toMatchObject({ succeeded: true, stdout: 'already exists' });
      expect(syncer.fastForward).not.toHaveBeenCalled();
    });

    it('refuses a directory that is not a git repository', async () => {
      mkdirSync(target.localPath);
      const result = await new TargetRunner({ syncer: fakeSyncer() }).execute(target, { kind: 'sync', update: true });
      expect(result.error?.code).toBe('NotARepository');
    });

    it('records transport failures', async () => {
      const syncer = fakeSyncer();
      vi.mocked(syncer.clone).mockRejectedValueOnce(new TransportError('git clone failed: could not resolve host'));
      const result = await new TargetRunner({ syncer }).execute(target, { kind: 'sync', update: true });
      expect(result.error).toEqual({ kind: 'TransportError', message: 'git clone failed: could not resolve host' });
    });
  });
});

describe('planSync', () => {
  it('plans a clone for a missing path', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'classfleet-plan-'));
    try {
      const target = { identifier: 'a', name: 'hw1-a', remoteUrl: 'u', localPath: join(dir, 'hw1-a') };
      expect(await planSync(target, true)).toBe('clone');
      writeFileSync(target.localPath, '');
      expect(await planSync(target, true)).toBe('not-a-repository');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('colorEnv', () => {
  it('appends to existing git config entries', () => {
    const env = colorEnv({ GIT_CONFIG_COUNT: '1', GIT_CONFIG_KEY_0: 'core.pager', GIT_CONFIG_VALUE_0: 'cat' });
    expect(env.GIT_CONFIG_COUNT).toBe('2');
    expect(env.GIT_CONFIG_KEY_0).toBe('core.pager');
    expect(env.GIT_CONFIG_KEY_1).toBe('color.ui');
    expect(env.GIT_CONFIG_VALUE_1).toBe('always');
  });
});
