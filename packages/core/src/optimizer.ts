import {
  type CarbonReading,
  type IntensityThresholds,
  type Logger,
  type OptimizationRule,
  type Precision,
  type TrainingConfig,
  ConfigError,
  PRECISION_ENERGY_FACTOR,
  silentLogger,
} from '@greengate/shared';

export interface OptimizerOptions {
  /** Floor for reduced batch sizes; a smaller base batch size is kept as is. */
  minBatchSize?: number;
  logger?: Logger;
}

/** ≤ min: unchanged, ≤ max: 75% batch, above: half batch with mixed precision. */
export function defaultRules(thresholds: IntensityThresholds): OptimizationRule[] {
  const candidates: OptimizationRule[] = [
    { maxIntensity: thresholds.minCarbonIntensity, batchSizeFactor: 1, precision: 'keep', label: 'optimal' },
    { maxIntensity: thresholds.maxCarbonIntensity, batchSizeFactor: 0.75, precision: 'keep', label: 'moderate' },
    { maxIntensity: Infinity, batchSizeFactor: 0.5, precision: 'mixed', label: 'high' },
  ];
  // Equal thresholds collapse into one band.
  const rules: OptimizationRule[] = [];
  for (const rule of candidates) {
    const previous = rules[rules.length - 1];
    if (!previous || rule.maxIntensity > previous.maxIntensity) rules.push(rule);
  }
  return rules;
}

export function validateRules(rules: readonly OptimizationRule[]): void {
  if (rules.length === 0) {
    throw new ConfigError('optimizer rule table is empty');
  }
  let sawMixed = false;
  rules.forEach((rule, i) => {
    if (!(rule.batchSizeFactor > 0 && rule.batchSizeFactor <= 1)) {
      throw new ConfigError(`optimizer rule ${i}: batchSizeFactor must be in (0, 1], got ${rule.batchSizeFactor}`);
    }
    if (i > 0) {
      const prev = rules[i - 1];
      if (!(rule.maxIntensity > prev.maxIntensity)) {
        throw new ConfigError(`optimizer rule ${i}: maxIntensity must increase (${prev.maxIntensity} → ${rule.maxIntensity})`);
      }
      if (rule.batchSizeFactor > prev.batchSizeFactor) {
        throw new ConfigError(`optimizer rule ${i}: batchSizeFactor must not increase with intensity`);
      }
    }
    if (rule.precision === 'mixed') sawMixed = true;
    else if (sawMixed) {
      throw new ConfigError(`optimizer rule ${i}: cannot return to full precision after a mixed-precision rule`);
    }
  });
  const last = rules[rules.length - 1];
  if (last.maxIntensity !== Infinity) {
    throw new ConfigError('optimizer rule table must end with an unbounded (Infinity) rule');
  }
}

export function precisionFactor(precision: Precision): number {
  return PRECISION_ENERGY_FACTOR[precision];
}

/** Relative energy cost of a configuration, batch size × precision factor. */
export function trainingLoad(config: TrainingConfig): number {
  return config.batchSize * precisionFactor(config.precision);
}

/**
 * Maps a carbon reading to a training configuration through an ordered rule table.
 * Higher intensity never yields a heavier configuration.
 */
export class Optimizer {
  private rules: readonly OptimizationRule[];
  private minBatchSize: number;
  private logger: Logger;

  constructor(rules: readonly OptimizationRule[], options: OptimizerOptions = {}) {
    validateRules(rules);
    this.rules = rules.map(rule => ({ ...rule }));
    this.minBatchSize = options.minBatchSize ?? 32;
    this.logger = options.logger ?? silentLogger;
  }

  static fromThresholds(thresholds: IntensityThresholds, options: OptimizerOptions = {}): Optimizer {
    return new Optimizer(defaultRules(thresholds), options);
  }

  getRules(): readonly OptimizationRule[] {
    return this.rules;
  }

  ruleFor(intensity: number): OptimizationRule {
    const clamped = Number.isNaN(intensity) ? Infinity : Math.max(0, intensity);
    const rule = this.rules.find(r => clamped <= r.maxIntensity);
    // validateRules guarantees an Infinity bound, so only NaN bounds could miss.
    return rule ?? this.rules[this.rules.length - 1];
  }

  suggest(base: TrainingConfig, reading: CarbonReading): TrainingConfig {
    const rule = this.ruleFor(reading.intensity);
    const reduced = Math.floor(base.batchSize * rule.batchSizeFactor);
    const floor = Math.min(this.minBatchSize, base.batchSize);
    const batchSize = Math.max(1, floor, reduced);
    const precision: Precision = rule.precision === 'mixed' ? 'mixed' : base.precision;

    const suggested: TrainingConfig = Object.freeze({ batchSize, precision, epochs: base.epochs });
    this.logger.debug(
      `Intensity ${reading.intensity} → rule ${rule.label ?? rule.maxIntensity}: batch ${base.batchSize}→${batchSize}, ${precision}`,
    );
    return suggested;
  }
}
