export { RepositorySet, ALL_TARGETS, type TargetSelection, type Discovery } from './repository-set.js';
export { TargetRunner, planSync, colorEnv, type SyncPlan, type TargetRunnerOptions } from './target-runner.js';
export { BatchExecutor, defaultConcurrency, type BatchRunOptions, type TargetWork } from './batch-executor.js';
export { summarize, describeRequest, exitCodeFor, passThrough } from './result-aggregator.js';
export { SyncCoordinator, tallySync, type SyncOptions, type SyncReport } from './sync-coordinator.js';
export { ShellCommandExecutor, type CommandExecutor, type CommandRunResult } from './command-executor.js';
export { GitOperations, GitRepositorySyncer, type RepositorySyncer } from './git-operations.js';
export * from './errors.js';
