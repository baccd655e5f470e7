import { spawn, type ChildProcess } from 'node:child_process';

/** Grace period between SIGTERM and SIGKILL when a command is stopped. */
export const KILL_GRACE_MS = 2000;

export interface CommandRunOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandRunResult {
  /** null when the process was ended by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  cancelled: boolean;
}

export interface CommandExecutor {
  run(command: string, options: CommandRunOptions): Promise<CommandRunResult>;
}

/**
 * Runs a command string through the platform shell (/bin/sh, cmd.exe).
 *
 * The string is handed to the shell as-is: the operator is trusted and
 * nothing is sandboxed or escaped. On POSIX the shell leads its own process
 * group so timeouts and cancellation also reach the processes it starts.
 */
export class ShellCommandExecutor implements CommandExecutor {
  run(command: string, options: CommandRunOptions): Promise<CommandRunResult> {
    return new Promise<CommandRunResult>((resolve, reject) => {
      const ownGroup = process.platform !== 'win32';
      const child = spawn(command, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        shell: true,
        detached: ownGroup,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let cancelled = false;
      let killTimer: NodeJS.Timeout | undefined;
      let timeoutTimer: NodeJS.Timeout | undefined;

      // The shell may have exited while a background job still holds the pipes,
      // so the group is signalled even after the shell itself is gone.
      const terminate = (): void => {
        if (killTimer) return;
        if (!ownGroup && (child.exitCode !== null || child.signalCode !== null)) return;
        signalProcess(child, 'SIGTERM', ownGroup);
        killTimer = setTimeout(() => signalProcess(child, 'SIGKILL', ownGroup), KILL_GRACE_MS);
      };

      const onAbort = (): void => {
        cancelled = true;
        terminate();
      };

      const cleanup = (): void => {
        if (timeoutTimer) clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);
      };

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => { stdout += chunk; });
      child.stderr.on('data', (chunk: string) => { stderr += chunk; });

      child.once('error', (err) => {
        cleanup();
        reject(err);
      });

      child.once('close', (code) => {
        cleanup();
        resolve({ exitCode: code, stdout, stderr, timedOut, cancelled });
      });

      if (options.timeoutMs !== undefined) {
        timeoutTimer = setTimeout(() => {
          timedOut = true;
          terminate();
        }, options.timeoutMs);
      }

      if (options.signal?.aborted) onAbort();
      else options.signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

function signalProcess(child: ChildProcess, signal: NodeJS.Signals, ownGroup: boolean): void {
  if (child.pid === undefined) return;
  if (ownGroup) {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch {
      // group already gone; fall through to the shell itself
    }
  }
  child.kill(signal);
}
