export type CarbonSource = 'live' | 'cached' | 'fallback_average' | 'mock';

export interface CarbonReading {
  readonly region: string;
  /** gCO2eq/kWh */
  readonly intensity: number;
  readonly timestamp: string;
  readonly source: CarbonSource;
}

export interface EmissionEquivalents {
  carMiles: number;
  phoneCharges: number;
  treeDays: number;
}
