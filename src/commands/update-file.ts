import type { Command } from 'commander';
import chalk from 'chalk';
import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ExecutionRequest } from '../config/schema.js';
import { exitCodeFor } from '../core/result-aggregator.js';
import { UsageError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import {
  addBatchOptions, createContext, interruptSignal, selectionFrom, withErrorHandling,
} from './shared.js';

export function registerUpdateFile(program: Command): void {
  const command = program
    .command('update-file')
    .description('Copy a file into the same place in each student repository')
    .argument('<assignment>', 'Assignment name (repository prefix)')
    .argument('<newfile>', 'Local file to copy')
    .argument('<filepath>', 'Destination path inside each repository')
    .argument('[students...]', 'Limit to these students (default: every local clone)');
  addBatchOptions(command);

  command.action(withErrorHandling(async (assignment: string, newfile: string, filepath: string, students: string[], opts: { concurrency?: number }) => {
    const source = resolve(newfile);
    let isFile = false;
    try {
      isFile = statSync(source).isFile();
    } catch {
      isFile = false;
    }
    if (!isFile) throw new UsageError(`${newfile} is not a readable file`);

    const ctx = createContext(assignment, { concurrency: opts.concurrency });
    const targets = await ctx.repositories.resolve(selectionFrom(students), { discovery: 'local' });
    if (targets.length === 0) {
      logger.warn(`No local repositories found for ${assignment}; run checkout first`);
      return;
    }

    console.log(`copying ${chalk.bold(newfile)} to:`);
    const request: ExecutionRequest = { kind: 'copy-file', source, destination: filepath };
    const interrupt = interruptSignal();
    try {
      const results = await ctx.executor.run(targets, (target, signal) => ctx.runner.execute(target, request, signal), {
        signal: interrupt.signal,
        onOrderedResult: (result, index) => ctx.renderer.renderLine(result, targets[index].name),
      });
      process.exitCode = exitCodeFor(results);
    } finally {
      interrupt.dispose();
    }
  }));
}
