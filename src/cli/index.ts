#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { checkCommand } from './commands/check';
import { installCommand } from './commands/install';
import { monitorCommand } from './commands/monitor';
import { startCommand } from './commands/start';
import { statusCommand } from './commands/status';

void yargs(hideBin(process.argv))
  .scriptName('service-watchdog')
  .usage('$0 <command> [options]')
  .command(checkCommand)
  .command(startCommand)
  .command(monitorCommand)
  .command(installCommand)
  .command(statusCommand)
  .demandCommand(1, 'Please specify a command')
  .strict()
  .help()
  .parseAsync();
