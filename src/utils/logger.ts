import chalk from 'chalk';

let verboseEnabled = false;

export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

/** Console logger with the CLI's color conventions. Errors go to stderr. */
export const logger = {
  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  },
  warn(message: string): void {
    console.log(chalk.yellow(`⚠ ${message}`));
  },
  error(message: string): void {
    console.error(chalk.red(message));
  },
  verbose(message: string): void {
    if (!verboseEnabled) return;
    console.log(chalk.dim(`  ${message}`));
  },
};
