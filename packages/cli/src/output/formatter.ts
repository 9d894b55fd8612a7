import {
  type CarbonBudget,
  type CarbonReading,
  type SchedulingDecision,
  type SessionReport,
  type TrainingConfig,
  budgetStatus,
} from '@greengate/shared';
import type { SessionTotals } from '@greengate/store';

export function formatKwh(kwh: number): string {
  if (kwh < 0.001) return `${(kwh * 1_000_000).toFixed(1)} mWh`;
  if (kwh < 1) return `${(kwh * 1_000).toFixed(2)} Wh`;
  return `${kwh.toFixed(3)} kWh`;
}

export function formatCarbon(grams: number): string {
  if (grams < 1) return `${(grams * 1_000).toFixed(1)} mg CO2eq`;
  if (grams < 1_000) return `${grams.toFixed(2)} g CO2eq`;
  return `${(grams / 1_000).toFixed(2)} kg CO2eq`;
}

export function formatCost(usd: number): string {
  return `$${usd.toFixed(4)}`;
}

export function formatReading(reading: CarbonReading): string {
  return `${reading.region} ${reading.intensity.toFixed(0)} gCO2/kWh (${reading.source})`;
}

export function formatConfig(config: TrainingConfig): string {
  return `batch ${config.batchSize}, ${config.precision} precision, ${config.epochs} epochs`;
}

export function formatDecision(decision: SchedulingDecision): string {
  return `[${decision.verdict.toUpperCase()}] ${decision.reason}\n  Carbon: ${formatReading(decision.reading)}`;
}

export function formatBudget(budget: CarbonBudget): string {
  const status = budgetStatus(budget);
  const line = `${formatCarbon(budget.consumedGrams)} / ${formatCarbon(budget.limitGrams)} (${status.percentUsed.toFixed(1)}%, ${budget.period})`;
  return status.exceeded ? `${line} [EXCEEDED]` : line;
}

function headline(report: SessionReport): string {
  switch (report.status) {
    case 'completed':
      return '[OK] Session completed';
    case 'rejected':
      return '[REJECTED] Session not started';
    case 'budget_exceeded':
      return '[BUDGET EXCEEDED] Training stopped';
    case 'cancelled':
      return report.partial ? '[CANCELLED] Training stopped' : '[CANCELLED] Session not started';
    case 'failed':
      return '[FAIL] Training failed';
  }
}

export function formatReport(report: SessionReport): string {
  const lines: string[] = [];
  lines.push(headline(report));
  if (report.error) lines.push(`  Reason: ${report.error}`);
  if (report.config) lines.push(`  Config: ${formatConfig(report.config)}`);
  lines.push(`  Polls:  ${report.decisions.length}`);

  lines.push('');
  lines.push('--- Carbon Summary ---');
  lines.push(`Energy:     ${formatKwh(report.energy?.totalKwh ?? 0)}`);
  lines.push(`Emissions:  ${formatCarbon(report.emissionsGrams)}`);
  lines.push(`Intensity:  ${report.averageIntensity.toFixed(1)} gCO2/kWh avg`);
  lines.push(`Cost:       ${formatCost(report.costUsd)}`);
  lines.push(
    `Equivalent: ${report.equivalents.carMiles.toFixed(3)} car miles, ` +
      `${report.equivalents.phoneCharges.toFixed(2)} phone charges, ` +
      `${report.equivalents.treeDays.toFixed(2)} tree-days`,
  );
  lines.push(`Budget:     ${formatBudget(report.budget)}`);
  if (report.budgetAlert) {
    lines.push('  [ALERT] Carbon budget exceeded during this session');
  }
  if (report.energy && report.energy.degradedSamples > 0) {
    lines.push(`  [WARN] ${report.energy.degradedSamples} of ${report.energy.sampleCount} samples estimated`);
  }
  return lines.join('\n');
}

export function formatHistory(reports: SessionReport[], totals: SessionTotals): string {
  if (reports.length === 0) return 'No sessions recorded.';
  const lines = reports.map(r =>
    [
      r.startedAt,
      r.status.padEnd(15),
      formatKwh(r.energy?.totalKwh ?? 0).padStart(11),
      formatCarbon(r.emissionsGrams).padStart(16),
      r.name ?? '-',
    ].join('  '),
  );
  lines.push('');
  lines.push(
    `${totals.sessions} sessions (${totals.completed} completed): ` +
      `${formatKwh(totals.energyKwh)}, ${formatCarbon(totals.emissionsGrams)}, ${formatCost(totals.costUsd)}`,
  );
  return lines.join('\n');
}
