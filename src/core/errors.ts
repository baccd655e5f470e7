import type { ErrorKind, FileSystemErrorCode, TargetError } from '../config/schema.js';

/** Base class for every error the fleet raises on purpose. */
export class FleetError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }
}

// ─── Fatal: abort before any per-target work ──────────────────────

export class ConfigurationError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ConfigurationError', message, options);
  }
}

export class ResolutionError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ResolutionError', message, options);
  }
}

export class RemoteListingError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RemoteListingError', message, options);
  }
}

export class UsageError extends FleetError {
  constructor(message: string) {
    super('UsageError', message);
  }
}

// ─── Per-target: recorded in the target's result ──────────────────

export class FileSystemError extends FleetError {
  readonly code: FileSystemErrorCode;

  constructor(code: FileSystemErrorCode, message: string, options?: { cause?: unknown }) {
    super('FileSystemError', message, options);
    this.code = code;
  }
}

export class SyncConflictError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SyncConflictError', message, options);
  }
}

export class TransportError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TransportError', message, options);
  }
}

export class CommandError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CommandError', message, options);
  }
}

export class TimeoutError extends FleetError {
  constructor(message: string) {
    super('TimeoutError', message);
  }
}

export class CancelledError extends FleetError {
  constructor(message = 'Cancelled') {
    super('CancelledError', message);
  }
}

// ─── Mapping ───────────────────────────────────────────────────────

const ERRNO_CODES: Record<string, FileSystemErrorCode> = {
  ENOENT: 'NotFound',
  EACCES: 'PermissionDenied',
  EPERM: 'PermissionDenied',
  EROFS: 'PermissionDenied',
  ENOTDIR: 'NotADirectory',
  EISDIR: 'IsADirectory',
};

function errnoCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

/** Wrap a Node fs error so it carries a FileSystemErrorCode. */
export function toFileSystemError(err: unknown): FileSystemError {
  if (err instanceof FileSystemError) return err;
  const errno = errnoCode(err);
  const code = (errno && ERRNO_CODES[errno]) || 'Unknown';
  return new FileSystemError(code, errorMessage(err), { cause: err });
}

/** Convert anything thrown during a target's work into a result error. */
export function toTargetError(err: unknown): TargetError {
  if (err instanceof FileSystemError) {
    return { kind: err.kind, code: err.code, message: err.message };
  }
  if (err instanceof FleetError) {
    return { kind: err.kind, message: err.message };
  }
  const errno = errnoCode(err);
  if (errno && ERRNO_CODES[errno]) {
    return { kind: 'FileSystemError', code: ERRNO_CODES[errno], message: errorMessage(err) };
  }
  return { kind: 'UnexpectedError', message: errorMessage(err) };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
