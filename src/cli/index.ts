#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { runCommand } from './commands/run';
import { statusCommand } from './commands/status';
import { stopCommand } from './commands/stop';

void yargs(hideBin(process.argv))
  .scriptName('station')
  .usage('$0 [command] [options]')
  .command(runCommand)
  .command(stopCommand)
  .command(statusCommand)
  .strict()
  .help()
  .parseAsync();
