import { z } from 'zod';
import { type CarbonReading, ProviderUnavailableError } from '@greengate/shared';
import { CarbonIntensityProvider } from './provider.js';

export interface ElectricityMapsOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  /** Injectable for tests. */
  fetchFn?: typeof fetch;
}

const latestResponseSchema = z.object({
  zone: z.string().optional(),
  carbonIntensity: z.number().nonnegative(),
  datetime: z.string().optional(),
});

export class ElectricityMapsProvider extends CarbonIntensityProvider {
  readonly name = 'electricitymap';
  private fetchFn: typeof fetch;

  constructor(private options: ElectricityMapsOptions) {
    super();
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async fetch(region: string, signal?: AbortSignal): Promise<CarbonReading> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/carbon-intensity/latest?zone=${encodeURIComponent(region)}`;
    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: { 'auth-token': this.options.apiKey },
        signal: combined,
      });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ProviderUnavailableError(this.name, region, `request failed: ${detail}`, err);
    }

    if (!response.ok) {
      throw new ProviderUnavailableError(this.name, region, `HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ProviderUnavailableError(this.name, region, 'response is not JSON', err);
    }

    const parsed = latestResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderUnavailableError(
        this.name,
        region,
        `unexpected response: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    return Object.freeze({
      region,
      intensity: parsed.data.carbonIntensity,
      timestamp: parsed.data.datetime ?? new Date().toISOString(),
      source: 'live' as const,
    });
  }
}
