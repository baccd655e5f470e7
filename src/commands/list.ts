import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import { existsSync } from 'node:fs';
import type { RepositoryTarget } from '../config/schema.js';
import { ALL_TARGETS } from '../core/repository-set.js';
import { createContext, withErrorHandling } from './shared.js';

export function registerList(program: Command): void {
  program
    .command('list')
    .description('List the repositories of an assignment on GitHub and whether they are cloned')
    .argument('<assignment>', 'Assignment name (repository prefix)')
    .action(withErrorHandling(async (assignment: string) => {
      const ctx = createContext(assignment, { remote: true });
      const spinner = ora(`Listing ${assignment}-* in ${ctx.settings.organization}...`).start();
      let targets: RepositoryTarget[];
      try {
        targets = await ctx.repositories.resolve(ALL_TARGETS);
      } catch (err) {
        spinner.fail('Listing failed');
        throw err;
      }
      spinner.stop();

      if (targets.length === 0) {
        console.log(chalk.yellow(`No repositories named ${assignment}-* in ${ctx.settings.organization}`));
        return;
      }

      const table = new Table({
        head: [chalk.dim('student'), chalk.dim('repository'), chalk.dim('local')],
        style: { head: [], border: [] },
      });
      let cloned = 0;
      for (const target of targets) {
        const present = existsSync(target.localPath);
        if (present) cloned++;
        table.push([chalk.white(target.identifier), chalk.dim(target.name), present ? chalk.green('✓') : chalk.dim('-')]);
      }
      console.log(table.toString());
      console.log(chalk.dim(`  ${targets.length} repositories, ${cloned} cloned in ${ctx.settings.working_dir}\n`));
    }));
}
