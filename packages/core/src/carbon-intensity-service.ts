import {
  type CarbonReading,
  type Clock,
  type Logger,
  ProviderUnavailableError,
  silentLogger,
  systemClock,
} from '@greengate/shared';
import type { CarbonIntensityProvider } from './providers/provider.js';
import { StaticTableProvider } from './providers/static-table.js';

export interface CarbonIntensityServiceOptions {
  provider: CarbonIntensityProvider;
  cacheTtlMs: number;
  /** How long a cached reading may still be served after the provider fails. */
  staleTtlMs: number;
  fallback?: StaticTableProvider;
  clock?: Clock;
  logger?: Logger;
}

interface CacheEntry {
  reading: CarbonReading;
  fetchedAt: number;
}

/**
 * Resolves the current carbon intensity for a region through
 * fresh cache → provider → stale cache → regional average → default average.
 * getCurrent() never rejects.
 */
export class CarbonIntensityService {
  private cache = new Map<string, CacheEntry>();
  private inFlight = new Map<string, Promise<CarbonReading>>();
  private latest = new Map<string, CarbonReading>();
  private provider: CarbonIntensityProvider;
  private fallback: StaticTableProvider;
  private clock: Clock;
  private logger: Logger;

  constructor(private options: CarbonIntensityServiceOptions) {
    this.provider = options.provider;
    this.clock = options.clock ?? systemClock;
    this.fallback = options.fallback ?? new StaticTableProvider(undefined, undefined, this.clock);
    this.logger = options.logger ?? silentLogger;
  }

  get providerName(): string {
    return this.provider.name;
  }

  async getCurrent(region: string): Promise<CarbonReading> {
    const entry = this.cache.get(region);
    if (entry && this.age(entry) < this.options.cacheTtlMs) {
      return this.remember(region, Object.freeze({ ...entry.reading, source: 'cached' as const }));
    }

    // Concurrent callers for the same region share one provider request.
    const pending = this.inFlight.get(region);
    if (pending) return pending;

    const request = this.refresh(region).finally(() => {
      this.inFlight.delete(region);
    });
    this.inFlight.set(region, request);
    return request;
  }

  /** The last reading handed out for a region, whatever its source. */
  getLatest(region: string): CarbonReading | undefined {
    return this.latest.get(region);
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async refresh(region: string): Promise<CarbonReading> {
    try {
      const reading = await this.provider.fetch(region);
      if (!Number.isFinite(reading.intensity) || reading.intensity < 0) {
        throw new ProviderUnavailableError(this.provider.name, region, `invalid intensity ${reading.intensity}`);
      }
      this.cache.set(region, { reading, fetchedAt: this.clock.now().getTime() });
      return this.remember(region, reading);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Carbon lookup for ${region} failed: ${message}`);
    }

    const stale = this.cache.get(region);
    if (stale && this.age(stale) < this.options.staleTtlMs) {
      this.logger.info(`Serving stale reading for ${region} (${Math.round(this.age(stale) / 1000)}s old)`);
      return this.remember(region, Object.freeze({ ...stale.reading, source: 'cached' as const }));
    }

    if (!this.fallback.has(region)) {
      this.logger.info(`No regional average for ${region}, using the default average`);
    }
    return this.remember(region, await this.fallback.fetch(region));
  }

  private age(entry: CacheEntry): number {
    return this.clock.now().getTime() - entry.fetchedAt;
  }

  private remember(region: string, reading: CarbonReading): CarbonReading {
    this.latest.set(region, reading);
    return reading;
  }
}
