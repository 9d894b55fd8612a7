import { Command } from 'commander';
import { action, openGreenGate, printJson, type CommonOptions } from '../setup.js';
import { formatConfig, formatDecision } from '../output/formatter.js';

export const checkCommand = new Command('check')
  .description('Evaluate once whether training may start now')
  .option('-c, --config <path>', 'Config file path')
  .option('-r, --region <zone>', 'Grid region to check')
  .option('--json', 'Output as JSON')
  .action(action(async (options: CommonOptions & { region?: string }) => {
    const gg = await openGreenGate(options);
    try {
      const request = gg.request();
      const target = options.region ? { ...request, region: options.region } : request;
      const decision = await gg.createScheduler().evaluate(target);
      const suggested = decision.verdict === 'proceed'
        ? gg.createOptimizer(target).suggest(target.baseConfig, decision.reading)
        : undefined;

      if (options.json) {
        printJson({ decision, config: suggested });
      } else {
        console.log(formatDecision(decision));
        if (suggested) console.log(`  Config: ${formatConfig(suggested)}`);
      }
      if (decision.verdict !== 'proceed') process.exitCode = 2;
    } finally {
      gg.close();
    }
  }));
