import { Command } from 'commander';
import { GreenGateError, type SessionStatus } from '@greengate/shared';
import { action, openGreenGate, printJson, type CommonOptions } from '../setup.js';
import { formatHistory } from '../output/formatter.js';

const STATUSES: SessionStatus[] = ['completed', 'failed', 'cancelled', 'budget_exceeded', 'rejected'];

function parseStatus(value: string): SessionStatus {
  const status = STATUSES.find(s => s === value);
  if (!status) throw new GreenGateError(`Unknown status "${value}" (expected one of ${STATUSES.join(', ')})`);
  return status;
}

export const historyCommand = new Command('history')
  .description('List recorded training sessions')
  .option('-c, --config <path>', 'Config file path')
  .option('-l, --limit <n>', 'Number of sessions to show', (v) => parseInt(v, 10), 20)
  .option('-s, --status <status>', 'Only sessions with this status')
  .option('--json', 'Output as JSON')
  .action(action(async (options: CommonOptions & { limit: number; status?: string }) => {
    const gg = await openGreenGate(options);
    try {
      if (!gg.store) {
        throw new GreenGateError('History needs the session store (store.enabled is false)');
      }
      const status = options.status ? parseStatus(options.status) : undefined;
      const reports = gg.store.sessions.list({ limit: options.limit, status });
      const totals = gg.store.sessions.totals();
      if (options.json) printJson({ sessions: reports, totals });
      else console.log(formatHistory(reports, totals));
    } finally {
      gg.close();
    }
  }));
