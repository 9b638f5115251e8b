#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { TICKSCOPE_VERSION } from '@tickscope/shared';
import { watchCommand } from './commands/watch.js';
import { topCommand } from './commands/top.js';
import { snapshotCommand } from './commands/snapshot.js';
import { doctorCommand } from './commands/doctor.js';
import { initCommand } from './commands/init.js';

const program = new Command();

program
  .name('tickscope')
  .version(TICKSCOPE_VERSION, '-v, --version')
  .description(chalk.bold('tickscope') + ' - host telemetry sampler')
  .addCommand(watchCommand)
  .addCommand(topCommand)
  .addCommand(snapshotCommand)
  .addCommand(doctorCommand)
  .addCommand(initCommand);

await program.parseAsync(process.argv);
