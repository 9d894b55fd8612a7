import type { CarbonReading } from '@greengate/shared';

/** A source of grid carbon intensity readings for a region. */
export abstract class CarbonIntensityProvider {
  abstract readonly name: string;

  /** Rejects with ProviderUnavailableError when no reading can be produced. */
  abstract fetch(region: string, signal?: AbortSignal): Promise<CarbonReading>;
}
