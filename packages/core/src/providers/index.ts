import { type CarbonApiConfig, type Clock, ConfigError } from '@greengate/shared';
import { CarbonIntensityProvider } from './provider.js';
import { ElectricityMapsProvider } from './electricity-maps.js';
import { MockProvider } from './mock.js';

export { CarbonIntensityProvider } from './provider.js';
export { ElectricityMapsProvider } from './electricity-maps.js';
export type { ElectricityMapsOptions } from './electricity-maps.js';
export { MockProvider } from './mock.js';
export type { MockProviderOptions } from './mock.js';
export { StaticTableProvider } from './static-table.js';

export function createCarbonProvider(config: CarbonApiConfig, clock?: Clock): CarbonIntensityProvider {
  switch (config.provider) {
    case 'electricitymap':
      if (!config.apiKey) {
        throw new ConfigError('carbonApi.apiKey is required for the electricitymap provider');
      }
      return new ElectricityMapsProvider({
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs,
      });
    case 'mock':
      return new MockProvider({ seed: config.seed, clock });
  }
}
