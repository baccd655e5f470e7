import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { input, password, select } from '@inquirer/prompts';
import { SettingsManager } from '../config/settings.js';
import { APP_NAME, DEFAULT_WORKING_DIR } from '../config/branding.js';
import type { CloneProtocol, Settings } from '../config/schema.js';
import { GitHubClient } from '../github/client.js';
import { UsageError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { withErrorHandling } from './shared.js';

export function registerConfigure(program: Command): void {
  program
    .command('configure')
    .description('Set up the organization, working directory and GitHub token')
    .option('--reset', 'Overwrite an existing configuration')
    .action(withErrorHandling(async (opts: { reset?: boolean }) => {
      const manager = new SettingsManager();
      if (manager.exists() && !opts.reset) {
        throw new UsageError(`${manager.settingsPath} already exists; pass --reset to overwrite it`);
      }

      const workingDir = await input({ message: 'Working directory for student repositories:', default: DEFAULT_WORKING_DIR });
      const organization = await input({
        message: 'GitHub organization:',
        validate: (value) => (value.trim() && !value.includes('/') ? true : 'Enter the organization name only'),
      });

      console.log(chalk.dim('\n  Visit https://github.com/settings/tokens/new to create a personal access token.'));
      console.log(chalk.magenta('  Select the \'repo\' scope so private student repositories are visible.\n'));
      const token = await password({ message: 'GitHub token:', mask: '*' });
      const protocol = await select<CloneProtocol>({
        message: 'Clone repositories over:',
        choices: [
          { name: 'SSH (git@github.com:...)', value: 'ssh' },
          { name: 'HTTPS (https://github.com/...)', value: 'https' },
        ],
      });

      const settings: Settings = {
        organization: organization.trim(),
        working_dir: workingDir.trim() || DEFAULT_WORKING_DIR,
        github_token: token.trim() || undefined,
        clone_protocol: protocol,
      };

      const spinner = ora(`Checking access to ${settings.organization}...`).start();
      try {
        const org = await GitHubClient.create(settings).verifyOrganization(settings.organization);
        spinner.succeed(`Connected to ${org.name ?? org.login}`);
      } catch (err) {
        spinner.fail('Login failed, settings not saved');
        throw err;
      }

      manager.save(settings);
      logger.success(`Saved ${manager.settingsPath}`);
      console.log(chalk.dim(`  Try: ${APP_NAME} checkout <assignment> --all`));
    }));
}
