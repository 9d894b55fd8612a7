#!/usr/bin/env node
import { Command } from 'commander';
import { checkCommand } from '../src/commands/check.js';
import { runCommand } from '../src/commands/run.js';
import { budgetCommand } from '../src/commands/budget.js';
import { historyCommand } from '../src/commands/history.js';
import { configCommand } from '../src/commands/config.js';

const program = new Command();

program
  .name('greengate')
  .description('GreenGate - carbon-aware scheduling for ML training')
  .version('0.1.0');

program.addCommand(checkCommand);
program.addCommand(runCommand);
program.addCommand(budgetCommand);
program.addCommand(historyCommand);
program.addCommand(configCommand);

await program.parseAsync();
