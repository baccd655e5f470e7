import type { Command } from 'commander';
import chalk from 'chalk';
import { input } from '@inquirer/prompts';
import type { ExecutionRequest } from '../config/schema.js';
import { exitCodeFor, passThrough } from '../core/result-aggregator.js';
import { UsageError } from '../core/errors.js';
import { matchesFilter, type OutputFilter } from '../ui/report.js';
import { logger } from '../utils/logger.js';
import {
  addBatchOptions, createContext, interruptSignal, selectionFrom, withErrorHandling,
} from './shared.js';

interface RunOptions {
  errorsOnly?: boolean;
  successOnly?: boolean;
  wait?: boolean;
  concurrency?: number;
  timeout?: number;
}

export function registerRun(program: Command): void {
  const command = program
    .command('run')
    .description('Run a shell command inside each student repository and show its output')
    .argument('<assignment>', 'Assignment name (repository prefix)')
    .argument('<command>', 'Command line, passed to the shell as-is (not sandboxed)')
    .argument('[students...]', 'Limit to these students (default: every local clone)')
    .option('--errors-only', 'Only show repositories where the command failed')
    .option('--success-only', 'Only show repositories where the command succeeded')
    .option('-w, --wait', 'Pause after each repository');
  addBatchOptions(command, { timeout: true });

  command.action(withErrorHandling(async (assignment: string, commandLine: string, students: string[], opts: RunOptions) => {
    if (opts.errorsOnly && opts.successOnly) {
      throw new UsageError('--errors-only and --success-only cannot be combined');
    }
    const filter: OutputFilter = opts.errorsOnly ? 'errors' : opts.successOnly ? 'success' : 'all';

    const ctx = createContext(assignment, { concurrency: opts.concurrency, timeout: opts.timeout });
    const targets = await ctx.repositories.resolve(selectionFrom(students), { discovery: 'local' });
    if (targets.length === 0) {
      logger.warn(`No local repositories found for ${assignment}; run checkout first`);
      return;
    }

    const request: ExecutionRequest = { kind: 'run-command', command: commandLine };
    const interrupt = interruptSignal();
    try {
      const results = await ctx.executor.run(targets, (target, signal) => ctx.runner.execute(target, request, signal), {
        signal: interrupt.signal,
        onOrderedResult: opts.wait
          ? undefined
          : (result, index) => {
            if (matchesFilter(result, filter)) ctx.renderer.renderTarget(result, targets[index].name);
          },
      });

      if (opts.wait) {
        for (const [index, result] of passThrough(results).entries()) {
          if (!matchesFilter(result, filter)) continue;
          ctx.renderer.renderTarget(result, targets[index].name);
          await input({ message: chalk.dim('press <Enter> to continue') });
        }
      }
      process.exitCode = exitCodeFor(results);
    } finally {
      interrupt.dispose();
    }
  }));
}
