import type { Command } from 'commander';
import chalk from 'chalk';
import { input } from '@inquirer/prompts';
import type { ExecutionRequest } from '../config/schema.js';
import { exitCodeFor } from '../core/result-aggregator.js';
import { highlightSource } from '../ui/report.js';
import { logger } from '../utils/logger.js';
import {
  addBatchOptions, createContext, interruptSignal, selectionFrom, withErrorHandling,
} from './shared.js';

export function registerShow(program: Command): void {
  const command = program
    .command('show')
    .description('Print a file from each student repository')
    .argument('<assignment>', 'Assignment name (repository prefix)')
    .argument('<filename>', 'Path inside each repository')
    .argument('[students...]', 'Limit to these students (default: every local clone)')
    .option('-w, --wait', 'Pause after each repository');
  addBatchOptions(command);

  command.action(withErrorHandling(async (assignment: string, filename: string, students: string[], opts: { wait?: boolean; concurrency?: number }) => {
    const ctx = createContext(assignment, { concurrency: opts.concurrency });
    const targets = await ctx.repositories.resolve(selectionFrom(students), { discovery: 'local' });
    if (targets.length === 0) {
      logger.warn(`No local repositories found for ${assignment}; run checkout first`);
      return;
    }

    const request: ExecutionRequest = { kind: 'read-file', path: filename };
    const interrupt = interruptSignal();
    try {
      const results = await ctx.executor.run(targets, (target, signal) => ctx.runner.execute(target, request, signal), {
        signal: interrupt.signal,
      });
      for (const [index, result] of results.entries()) {
        const shown = result.succeeded ? { ...result, stdout: highlightSource(result.stdout, filename) } : result;
        ctx.renderer.renderTarget(shown, `${targets[index].name}/${filename}`);
        if (opts.wait && index < results.length - 1) {
          await input({ message: chalk.dim('press <Enter> to continue') });
        }
      }
      process.exitCode = exitCodeFor(results);
    } finally {
      interrupt.dispose();
    }
  }));
}
