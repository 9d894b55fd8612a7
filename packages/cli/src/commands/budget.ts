import { Command } from 'commander';
import { budgetStatus } from '@greengate/shared';
import { action, openGreenGate, printJson, type CommonOptions } from '../setup.js';
import { formatBudget } from '../output/formatter.js';

export const budgetCommand = new Command('budget')
  .description('Show or reset the carbon budget')
  .option('-c, --config <path>', 'Config file path')
  .option('--reset', 'Reset consumption for the current period')
  .option('--json', 'Output as JSON')
  .action(action(async (options: CommonOptions & { reset?: boolean }) => {
    const gg = await openGreenGate(options);
    try {
      const budget = options.reset ? await gg.ledger.reset() : gg.ledger.snapshot();
      if (options.json) {
        printJson({ budget, status: budgetStatus(budget) });
      } else {
        if (options.reset) console.log('Budget reset.');
        console.log(`Budget: ${formatBudget(budget)}`);
        console.log(`Period started: ${budget.periodStart}`);
      }
    } finally {
      gg.close();
    }
  }));
