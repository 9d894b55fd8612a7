import type Database from 'better-sqlite3';
import type { CarbonBudget, SessionReport } from '@greengate/shared';
import { createTestDatabase } from '../src/database.js';
import { runMigrations } from '../src/migrations.js';
import { allMigrations } from '../src/migrations/index.js';

/** Create a fresh in-memory database with all migrations applied. */
export function freshDb(): Database.Database {
  const db = createTestDatabase();
  runMigrations(db, allMigrations);
  return db;
}

export const budgetFixture: CarbonBudget = {
  limitGrams: 1_000,
  period: 'daily',
  consumedGrams: 125.5,
  periodStart: '2024-05-01T00:00:00.000Z',
};

export function reportFixture(overrides: Partial<SessionReport> = {}): SessionReport {
  return {
    id: 'session_001',
    name: 'resnet-finetune',
    region: 'DE',
    status: 'completed',
    partial: false,
    decisions: [
      {
        verdict: 'proceed',
        code: 'optimal',
        reason: 'optimal carbon intensity: 150 gCO2/kWh <= 200',
        reading: { region: 'DE', intensity: 150, timestamp: '2024-05-01T02:00:00.000Z', source: 'mock' },
        attempt: 1,
        evaluatedAt: '2024-05-01T02:00:00.000Z',
      },
    ],
    config: { batchSize: 64, precision: 'full', epochs: 10 },
    energy: {
      startedAt: '2024-05-01T02:00:00.000Z',
      endedAt: '2024-05-01T03:00:00.000Z',
      durationSeconds: 3_600,
      samplingIntervalMs: 1_000,
      samples: [],
      sampleCount: 3_600,
      totalKwh: 0.2,
      averagePowerWatts: 200,
      peakPowerWatts: 240,
      cpuTdpWatts: 65,
      degradedSamples: 0,
    },
    emissionsGrams: 30,
    costUsd: 0.06,
    equivalents: { carMiles: 30 / 404, phoneCharges: 30 / 8.4, treeDays: 30 / (21_800 / 365) },
    averageIntensity: 150,
    budget: budgetFixture,
    budgetAlert: false,
    startedAt: '2024-05-01T02:00:00.000Z',
    completedAt: '2024-05-01T03:00:00.000Z',
    ...overrides,
  };
}
