import type { GreenGateConfig } from './types/config.js';
import type { Precision } from './types/training.js';
import { greenGateConfigSchema } from './schemas/config.schema.js';

export const DEFAULT_REGION = 'default';

/** Annual grid averages in gCO2eq/kWh, served when no live reading is available. */
export const REGIONAL_AVERAGE_INTENSITY: Record<string, number> = {
  'IN-SO': 708, // India South (coal heavy)
  'US-CA': 234, // California
  DE: 401,
  FR: 79, // nuclear heavy
  GB: 233,
  CN: 681,
  JP: 475,
  [DEFAULT_REGION]: 475, // global average
};

/** Retail electricity prices, USD per kWh. */
export const REGION_PRICE_PER_KWH: Record<string, number> = {
  'IN-SO': 0.08,
  'US-CA': 0.20,
  DE: 0.30,
  FR: 0.18,
  GB: 0.25,
  CN: 0.08,
  JP: 0.26,
  [DEFAULT_REGION]: 0.15,
};

export const GRAMS_CO2_PER_CAR_MILE = 404;
export const GRAMS_CO2_PER_PHONE_CHARGE = 8.4;
// 21.8 kg absorbed per tree per year
export const GRAMS_CO2_PER_TREE_DAY = 21_800 / 365;

export const PRECISION_ENERGY_FACTOR: Record<Precision, number> = {
  full: 1,
  mixed: 0.5,
};

export const DEFAULT_CONFIG: GreenGateConfig = greenGateConfigSchema.parse({});
