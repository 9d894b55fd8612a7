import type { CarbonReading, Clock } from '@greengate/shared';
import { CarbonIntensityProvider } from '../src/providers/provider.js';

/** Clock whose time only moves when told to; sleep() advances it instantly. */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  onSleep?: (ms: number) => void;
  private current: number;

  constructor(start: Date) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    this.onSleep?.(ms);
    if (signal?.aborted) return;
    this.advance(ms);
  }
}

/** Local 03:00 on 1 May 2024. */
export function nightTime(): Date {
  return new Date(2024, 4, 1, 3, 0, 0);
}

/** Returns the scripted values in order, repeating the last one; Error entries reject. */
export class ScriptedProvider extends CarbonIntensityProvider {
  readonly name = 'scripted';
  calls = 0;

  constructor(private values: Array<number | Error>) {
    super();
  }

  async fetch(region: string): Promise<CarbonReading> {
    const value = this.values[Math.min(this.calls, this.values.length - 1)];
    this.calls++;
    if (value instanceof Error) throw value;
    return { region, intensity: value, timestamp: '2024-05-01T03:00:00.000Z', source: 'live' };
  }
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function constantSampler(utilization: number) {
  return { name: 'constant', sample: async () => utilization };
}
