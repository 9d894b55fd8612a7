import { Command } from 'commander';
import type { TrainFn } from '@greengate/core';
import { action, openGreenGate, printJson, type CommonOptions } from '../setup.js';
import { runTrainingCommand } from '../child.js';
import { formatReport } from '../output/formatter.js';

interface RunOptions extends CommonOptions {
  wait?: boolean;
  name?: string;
}

export const runCommand = new Command('run')
  .description('Run a training command when the grid is clean enough')
  .argument('<command...>', 'Training command and its arguments (after --)')
  .option('-c, --config <path>', 'Config file path')
  .option('-w, --wait', 'Poll with backoff instead of giving up when carbon is too high')
  .option('-n, --name <name>', 'Session name')
  .option('--json', 'Output the report as JSON')
  .action(action(async (commandLine: string[], options: RunOptions) => {
    const [command, ...args] = commandLine;
    // Without --wait a single poll decides.
    const overrides = options.wait ? undefined : { train: { backoff: { maxRetries: 1 } } };
    const gg = await openGreenGate(options, overrides);

    const controller = new AbortController();
    const onSignal = () => controller.abort();
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    try {
      const train: TrainFn = (ctx) => runTrainingCommand(command, args, ctx);
      const report = await gg
        .createScheduler()
        .runSession(gg.request(options.name ?? command), train, { signal: controller.signal });

      if (options.json) printJson(report);
      else console.log(formatReport(report));

      if (report.status === 'rejected') process.exitCode = 2;
      else if (report.status !== 'completed') process.exitCode = 1;
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      gg.close();
    }
  }));
