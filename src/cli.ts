#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, APP_VERSION, APP_CONFIG_DIR_DISPLAY } from './config/branding.js';
import { setVerbose } from './utils/logger.js';
import { registerCheckout } from './commands/checkout.js';
import { registerRun } from './commands/run.js';
import { registerCheck } from './commands/check.js';
import { registerUpdateFile } from './commands/update-file.js';
import { registerShow } from './commands/show.js';
import { registerList } from './commands/list.js';
import { registerConfigure } from './commands/configure.js';

const program = new Command();

program
  .name(APP_NAME)
  .description(`Run batch operations across student assignment repositories (settings in ${APP_CONFIG_DIR_DISPLAY})`)
  .version(APP_VERSION)
  .option('-v, --verbose', 'Print what is being resolved and run')
  .hook('preAction', (thisCommand) => {
    setVerbose(Boolean(thisCommand.opts().verbose));
  });

// ═══════════════════════════════════════════════════════════════════════
// Commands
// ═══════════════════════════════════════════════════════════════════════

registerConfigure(program);
registerList(program);
registerCheckout(program);
registerRun(program);
registerCheck(program);
registerUpdateFile(program);
registerShow(program);

await program.parseAsync(process.argv);
