import { z } from 'zod';
import { DEFAULT_WORKING_DIR } from './branding.js';

// ─── Clone Protocol ────────────────────────────────────────────────

export const CloneProtocolSchema = z.enum(['ssh', 'https']);

export type CloneProtocol = z.infer<typeof CloneProtocolSchema>;

// ─── Settings ──────────────────────────────────────────────────────

export const SettingsSchema = z.object({
  organization: z.string().min(1, 'organization must not be empty'),
  working_dir: z.string().min(1).default(DEFAULT_WORKING_DIR),
  github_token: z.string().min(1).optional(),
  clone_protocol: CloneProtocolSchema.default('ssh'),
  /** Upper bound on repositories processed at once. Defaults to available parallelism. */
  concurrency: z.number().int().positive().optional(),
  /** Per-repository limit for run/check commands. */
  command_timeout_seconds: z.number().positive().optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ─── Assignment Selector ───────────────────────────────────────────

export const AssignmentSelectorSchema = z.object({
  organization: z.string().min(1),
  assignmentPrefix: z
    .string()
    .min(1, 'assignment name must not be empty')
    .refine((s) => !s.includes('/'), 'assignment name must not contain "/"'),
  workingDirectory: z.string().min(1),
  cloneProtocol: CloneProtocolSchema.default('ssh'),
});

export type AssignmentSelector = z.infer<typeof AssignmentSelectorSchema>;

// ─── Repository Target ─────────────────────────────────────────────

export interface RepositoryTarget {
  /** Student slug, e.g. "alice" for repo "hw1-alice". */
  identifier: string;
  /** Full repository name: {assignment}-{identifier}. */
  name: string;
  remoteUrl: string;
  localPath: string;
}

/** A repository as reported by the remote listing. */
export interface RemoteRepository {
  name: string;
  remoteUrl: string;
}

// ─── Execution Requests ────────────────────────────────────────────

export type ExecutionRequest =
  | { kind: 'sync'; update: boolean }
  | { kind: 'run-command'; command: string }
  | { kind: 'copy-file'; source: string; destination: string }
  | { kind: 'read-file'; path: string };

// ─── Errors ────────────────────────────────────────────────────────

export type ErrorKind =
  | 'ConfigurationError'
  | 'ResolutionError'
  | 'RemoteListingError'
  | 'UsageError'
  | 'FileSystemError'
  | 'SyncConflictError'
  | 'TransportError'
  | 'TimeoutError'
  | 'CancelledError'
  | 'CommandError'
  | 'UnexpectedError';

export type FileSystemErrorCode =
  | 'NotFound'
  | 'PermissionDenied'
  | 'NotADirectory'
  | 'IsADirectory'
  | 'NotARepository'
  | 'Unknown';

export interface TargetError {
  kind: ErrorKind;
  message: string;
  code?: FileSystemErrorCode;
}

// ─── Results ───────────────────────────────────────────────────────

export interface TargetResult {
  identifier: string;
  succeeded: boolean;
  exitCode?: number;
  stdout: string;
  stderr: string;
  /** Wall-clock seconds, populated even on failure. */
  duration: number;
  error?: TargetError;
}

export interface BatchCounts {
  passing: number;
  failing: number;
}

export interface BatchTiming {
  min: number;
  max: number;
  average: number;
}

export interface BatchReport {
  description: string;
  results: TargetResult[];
  counts: BatchCounts;
  timing: BatchTiming;
}

// ─── Sync ──────────────────────────────────────────────────────────

export type SyncAction = 'cloned' | 'updated' | 'up-to-date' | 'skipped';

export interface SyncOutcome {
  action: SyncAction;
  summary: string;
}

export interface SyncTally {
  cloned: number;
  updated: number;
  upToDate: number;
  skipped: number;
  failed: number;
}
