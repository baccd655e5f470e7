import type { Command } from 'commander';
import chalk from 'chalk';
import { ALL_TARGETS } from '../core/repository-set.js';
import { SyncCoordinator } from '../core/sync-coordinator.js';
import { exitCodeFor } from '../core/result-aggregator.js';
import { UsageError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { addBatchOptions, createContext, interruptSignal, withErrorHandling } from './shared.js';

export function registerCheckout(program: Command): void {
  const command = program
    .command('checkout')
    .description('Clone student repositories, or fast-forward the ones already cloned')
    .argument('<assignment>', 'Assignment name (repository prefix)')
    .argument('[students...]', 'Student names; repositories are {assignment}-{student}')
    .option('-a, --all', 'Every repository of the assignment in the organization')
    .option('--no-update', 'Only clone missing repositories, leave existing ones untouched');
  addBatchOptions(command);

  command.action(withErrorHandling(async (assignment: string, students: string[], opts: { all?: boolean; update: boolean; concurrency?: number }) => {
    if ((students.length === 0 && !opts.all) || (students.length > 0 && opts.all)) {
      throw new UsageError('must provide either student names or explicitly pass --all');
    }

    const ctx = createContext(assignment, { remote: opts.all, concurrency: opts.concurrency });
    const targets = await ctx.repositories.resolve(opts.all ? ALL_TARGETS : students);
    if (targets.length === 0) {
      logger.warn(`No repositories found for ${assignment}`);
      return;
    }
    logger.verbose(`${targets.length} repositories: ${targets.map((t) => t.name).join(', ')}`);

    console.log(chalk.bold(`\n  Syncing ${targets.length} repositories into ${ctx.settings.working_dir}\n`));
    const coordinator = new SyncCoordinator(ctx.runner, ctx.executor);
    const interrupt = interruptSignal();
    try {
      const report = await coordinator.sync(targets, {
        update: opts.update,
        concurrency: opts.concurrency,
        signal: interrupt.signal,
        onOrderedResult: (result, index) => ctx.renderer.renderLine(result, targets[index].name),
      });
      ctx.renderer.renderSyncTally(report.tally);
      process.exitCode = exitCodeFor(report.results);
    } finally {
      interrupt.dispose();
    }
  }));
}
