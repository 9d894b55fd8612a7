import { describe, it, expect } from 'vitest';
import { ConfigError, type CarbonReading, type TrainingConfig } from '@greengate/shared';
import { Optimizer, defaultRules, validateRules, trainingLoad } from '../src/optimizer.js';

const thresholds = { minCarbonIntensity: 200, maxCarbonIntensity: 400 };

function reading(intensity: number): CarbonReading {
  return { region: 'DE', intensity, timestamp: '2024-05-01T03:00:00.000Z', source: 'live' };
}

function base(batchSize: number, precision: TrainingConfig['precision'] = 'full'): TrainingConfig {
  return { batchSize, precision, epochs: 10 };
}

describe('Optimizer', () => {
  const optimizer = Optimizer.fromThresholds(thresholds);

  it('keeps the base configuration at low intensity', () => {
    expect(optimizer.suggest(base(64), reading(150))).toEqual({ batchSize: 64, precision: 'full', epochs: 10 });
  });

  it('treats the thresholds as inclusive upper bounds', () => {
    expect(optimizer.suggest(base(64), reading(200)).batchSize).toBe(64);
    expect(optimizer.suggest(base(64), reading(400)).batchSize).toBe(48);
    expect(optimizer.suggest(base(64), reading(401)).precision).toBe('mixed');
  });

  it('reduces batch size at moderate intensity', () => {
    expect(optimizer.suggest(base(64), reading(300))).toEqual({ batchSize: 48, precision: 'full', epochs: 10 });
  });

  it('halves batch size and switches to mixed precision at high intensity', () => {
    expect(optimizer.suggest(base(128), reading(500))).toEqual({ batchSize: 64, precision: 'mixed', epochs: 10 });
  });

  it('does not reduce below the minimum batch size', () => {
    expect(optimizer.suggest(base(40), reading(500)).batchSize).toBe(32);
    expect(optimizer.suggest(base(64), reading(500)).batchSize).toBe(32);
  });

  it('keeps a base batch size that is already below the minimum', () => {
    expect(optimizer.suggest(base(16), reading(500)).batchSize).toBe(16);
    expect(optimizer.suggest(base(1), reading(900)).batchSize).toBe(1);
  });

  it('honours a custom minimum batch size', () => {
    const small = Optimizer.fromThresholds(thresholds, { minBatchSize: 8 });
    expect(small.suggest(base(40), reading(500)).batchSize).toBe(20);
  });

  it('clamps negative intensity to zero and NaN to the heaviest band', () => {
    expect(optimizer.ruleFor(-50).label).toBe('optimal');
    expect(optimizer.ruleFor(Number.NaN).label).toBe('high');
  });

  it('never increases training load as intensity rises', () => {
    for (const batchSize of [1, 16, 33, 40, 64, 128, 1_000]) {
      for (const precision of ['full', 'mixed'] as const) {
        let previous = Infinity;
        for (let intensity = 0; intensity <= 1_000; intensity += 10) {
          const load = trainingLoad(optimizer.suggest(base(batchSize, precision), reading(intensity)));
          expect(load).toBeLessThanOrEqual(previous);
          previous = load;
        }
      }
    }
  });

  it('returns a valid configuration across extreme intensities', () => {
    const intensities = [-100, 0, 180, 400, 10_000];
    const suggestions = intensities.map(i => optimizer.suggest(base(64), reading(i)));
    expect(suggestions).toEqual([
      { batchSize: 64, precision: 'full', epochs: 10 },
      { batchSize: 64, precision: 'full', epochs: 10 },
      { batchSize: 64, precision: 'full', epochs: 10 },
      { batchSize: 48, precision: 'full', epochs: 10 },
      { batchSize: 32, precision: 'mixed', epochs: 10 },
    ]);
    for (const config of suggestions) {
      expect(Number.isInteger(config.batchSize)).toBe(true);
      expect(config.batchSize).toBeGreaterThanOrEqual(1);
      expect(['full', 'mixed']).toContain(config.precision);
    }
  });

  it('returns frozen configurations', () => {
    expect(Object.isFrozen(optimizer.suggest(base(64), reading(100)))).toBe(true);
  });
});

describe('defaultRules', () => {
  it('derives three bands from the thresholds', () => {
    expect(defaultRules(thresholds).map(r => [r.maxIntensity, r.batchSizeFactor, r.precision])).toEqual([
      [200, 1, 'keep'],
      [400, 0.75, 'keep'],
      [Infinity, 0.5, 'mixed'],
    ]);
  });

  it('collapses equal thresholds into one band', () => {
    expect(defaultRules({ minCarbonIntensity: 300, maxCarbonIntensity: 300 })).toHaveLength(2);
  });
});

describe('validateRules', () => {
  const unbounded = { maxIntensity: Infinity, batchSizeFactor: 0.5, precision: 'mixed' as const };

  it('rejects an empty table', () => {
    expect(() => validateRules([])).toThrow(ConfigError);
  });

  it('requires an unbounded last rule', () => {
    expect(() => validateRules([{ maxIntensity: 500, batchSizeFactor: 1, precision: 'keep' }])).toThrow(/Infinity/);
  });

  it('requires increasing bounds', () => {
    expect(() =>
      validateRules([
        { maxIntensity: 300, batchSizeFactor: 1, precision: 'keep' },
        { maxIntensity: 300, batchSizeFactor: 0.8, precision: 'keep' },
        unbounded,
      ]),
    ).toThrow(/maxIntensity must increase/);
  });

  it('rejects factors outside (0, 1]', () => {
    expect(() => validateRules([{ ...unbounded, batchSizeFactor: 0 }])).toThrow(/batchSizeFactor/);
    expect(() => validateRules([{ ...unbounded, batchSizeFactor: 1.5 }])).toThrow(/batchSizeFactor/);
  });

  it('rejects factors that grow with intensity', () => {
    expect(() =>
      validateRules([
        { maxIntensity: 300, batchSizeFactor: 0.5, precision: 'keep' },
        { maxIntensity: Infinity, batchSizeFactor: 0.8, precision: 'keep' },
      ]),
    ).toThrow(/must not increase/);
  });

  it('rejects returning to full precision', () => {
    expect(() =>
      validateRules([
        { maxIntensity: 300, batchSizeFactor: 1, precision: 'mixed' },
        { maxIntensity: Infinity, batchSizeFactor: 1, precision: 'keep' },
      ]),
    ).toThrow(/cannot return to full precision/);
  });

  it('accepts the default table', () => {
    expect(() => validateRules(defaultRules(thresholds))).not.toThrow();
  });
});
