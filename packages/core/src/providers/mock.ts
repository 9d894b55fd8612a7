import { type CarbonReading, type Clock, systemClock } from '@greengate/shared';
import { CarbonIntensityProvider } from './provider.js';

interface HourBand {
  base: number;
  spread: number;
}

// Night is cleanest, the morning and evening peaks dirtiest.
function bandFor(hour: number): HourBand {
  if (hour <= 6) return { base: 150, spread: 30 };
  if ((hour >= 7 && hour <= 9) || (hour >= 18 && hour <= 22)) return { base: 350, spread: 50 };
  return { base: 250, spread: 40 };
}

/** mulberry32 */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface MockProviderOptions {
  seed?: number;
  clock?: Clock;
}

/** Synthetic readings that follow a daily grid curve. Never fails. */
export class MockProvider extends CarbonIntensityProvider {
  readonly name = 'mock';
  private random: () => number;
  private clock: Clock;

  constructor(options: MockProviderOptions = {}) {
    super();
    this.random = options.seed === undefined ? Math.random : seededRandom(options.seed);
    this.clock = options.clock ?? systemClock;
  }

  async fetch(region: string): Promise<CarbonReading> {
    const now = this.clock.now();
    const { base, spread } = bandFor(now.getHours());
    const intensity = Math.max(0, Math.round(base + (this.random() * 2 - 1) * spread));
    return Object.freeze({
      region,
      intensity,
      timestamp: now.toISOString(),
      source: 'mock' as const,
    });
  }
}
