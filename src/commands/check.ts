import type { Command } from 'commander';
import ora from 'ora';
import type { ExecutionRequest } from '../config/schema.js';
import { describeRequest, exitCodeFor, summarize } from '../core/result-aggregator.js';
import { logger } from '../utils/logger.js';
import { formatSeconds } from '../ui/report.js';
import {
  addBatchOptions, createContext, interruptSignal, selectionFrom, withErrorHandling,
} from './shared.js';

export function registerCheck(program: Command): void {
  const command = program
    .command('check')
    .description('Run a shell command in each student repository and summarize pass/fail and timing')
    .argument('<assignment>', 'Assignment name (repository prefix)')
    .argument('<command>', 'Command line, passed to the shell as-is (not sandboxed)')
    .argument('[students...]', 'Limit to these students (default: every local clone)');
  addBatchOptions(command, { timeout: true });

  command.action(withErrorHandling(async (assignment: string, commandLine: string, students: string[], opts: { concurrency?: number; timeout?: number }) => {
    const ctx = createContext(assignment, { concurrency: opts.concurrency, timeout: opts.timeout });
    const targets = await ctx.repositories.resolve(selectionFrom(students), { discovery: 'local' });
    if (targets.length === 0) {
      logger.warn(`No local repositories found for ${assignment}; run checkout first`);
      return;
    }

    const request: ExecutionRequest = { kind: 'run-command', command: commandLine };
    const label = `Running '${commandLine}'...`;
    const spinner = ora(`${label} 0/${targets.length}`).start();
    const interrupt = interruptSignal();
    let finished = 0;
    try {
      const results = await ctx.executor.run(targets, (target, signal) => ctx.runner.execute(target, request, signal), {
        signal: interrupt.signal,
        onResult: (result) => {
          finished++;
          spinner.text = `${label} ${finished}/${targets.length}`;
          logger.verbose(`${result.identifier}: ${result.succeeded ? 'ok' : 'failed'} in ${formatSeconds(result.duration)}`);
        },
      });
      spinner.stop();

      const report = summarize(results, describeRequest(request));
      ctx.renderer.renderReport(report);
      process.exitCode = exitCodeFor(report.results);
    } finally {
      if (spinner.isSpinning) spinner.stop();
      interrupt.dispose();
    }
  }));
}
