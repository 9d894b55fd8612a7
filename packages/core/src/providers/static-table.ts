import {
  type CarbonReading,
  type Clock,
  DEFAULT_REGION,
  REGIONAL_AVERAGE_INTENSITY,
  systemClock,
} from '@greengate/shared';
import { CarbonIntensityProvider } from './provider.js';

/** Serves the annual regional averages; unknown regions get the default average. */
export class StaticTableProvider extends CarbonIntensityProvider {
  readonly name = 'static';

  constructor(
    private table: Record<string, number> = REGIONAL_AVERAGE_INTENSITY,
    private defaultRegion: string = DEFAULT_REGION,
    private clock: Clock = systemClock,
  ) {
    super();
  }

  has(region: string): boolean {
    return Object.hasOwn(this.table, region);
  }

  intensityFor(region: string): number {
    if (this.has(region)) return this.table[region];
    if (Object.hasOwn(this.table, this.defaultRegion)) return this.table[this.defaultRegion];
    return REGIONAL_AVERAGE_INTENSITY[DEFAULT_REGION];
  }

  async fetch(region: string): Promise<CarbonReading> {
    return Object.freeze({
      region,
      intensity: this.intensityFor(region),
      timestamp: this.clock.now().toISOString(),
      source: 'fallback_average' as const,
    });
  }
}
