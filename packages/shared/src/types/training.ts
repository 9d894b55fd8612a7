export type Precision = 'full' | 'mixed';

export interface TrainingConfig {
  readonly batchSize: number;
  readonly precision: Precision;
  readonly epochs: number;
}

export interface OptimizationRule {
  /** Inclusive upper bound in gCO2eq/kWh; the last rule must be Infinity. */
  maxIntensity: number;
  batchSizeFactor: number;
  precision: 'keep' | 'mixed';
  label?: string;
}
