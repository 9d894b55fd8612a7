import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger } from '@greengate/shared';
import { EnergyMonitor, withEnergyMonitor } from '../src/energy-monitor.js';
import { constantSampler } from './helpers.js';

// 50 W for one second, in kWh
const FIFTY_WATT_SECOND_KWH = 50 / 3_600_000;

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(new Date('2024-05-01T03:00:00.000Z'));
});

afterEach(() => {
  vi.useRealTimers();
});

describe('EnergyMonitor', () => {
  it('integrates power over the sampling interval', async () => {
    const monitor = new EnergyMonitor({ cpuSampler: constantSampler(0.5), cpuTdpWatts: 100 });
    monitor.start(1_000);
    await vi.advanceTimersByTimeAsync(3_000);

    expect(monitor.currentTotalKwh()).toBeCloseTo(3 * FIFTY_WATT_SECOND_KWH, 15);
    const session = monitor.stop();
    expect(session.sampleCount).toBe(3);
    expect(session.averagePowerWatts).toBe(50);
    expect(session.peakPowerWatts).toBe(50);
    expect(session.durationSeconds).toBe(3);
    expect(session.samples.map(s => s.cpuUtilization)).toEqual([0.5, 0.5, 0.5]);
    expect(session.totalKwh).toBeCloseTo(3 * FIFTY_WATT_SECOND_KWH, 15);
  });

  it('interpolates between idle and max power', async () => {
    const monitor = new EnergyMonitor({
      cpuSampler: constantSampler(0.5),
      cpuTdpWatts: 100,
      idleFraction: 0.2,
      maxFraction: 0.8,
    });
    monitor.start(1_000);
    await vi.advanceTimersByTimeAsync(1_000);
    // 20 W idle + (80 - 20) × 0.5
    expect(monitor.latestSample()?.cpuPowerWatts).toBe(50);
    monitor.stop();
  });

  it('adds accelerator power', async () => {
    const monitor = new EnergyMonitor({
      cpuSampler: constantSampler(0),
      cpuTdpWatts: 100,
      acceleratorSampler: { name: 'gpu', sample: async () => ({ powerWatts: 120, utilization: 0.9, devices: 1 }) },
    });
    monitor.start(1_000);
    await vi.advanceTimersByTimeAsync(1_000);
    const sample = monitor.latestSample();
    expect(sample?.acceleratorPowerWatts).toBe(120);
    expect(sample?.powerWatts).toBe(120);
    monitor.stop();
  });

  it('marks samples degraded and warns once when the CPU sampler fails', async () => {
    const warnings: string[] = [];
    const logger = createLogger('monitor', 'warn', (level, line) => {
      if (level === 'warn') warnings.push(line);
    });
    const monitor = new EnergyMonitor({
      cpuSampler: { name: 'broken', sample: async () => { throw new Error('no /proc/stat'); } },
      cpuTdpWatts: 100,
      logger,
    });

    monitor.start(1_000);
    await vi.advanceTimersByTimeAsync(3_000);
    const session = monitor.stop();

    expect(session.degradedSamples).toBe(3);
    expect(session.samples.every(s => s.degraded && s.powerWatts === 50)).toBe(true);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toContain('Energy sampler broken failed: no /proc/stat');
  });

  it('treats accelerator failures as zero accelerator power', async () => {
    const monitor = new EnergyMonitor({
      cpuSampler: constantSampler(1),
      cpuTdpWatts: 40,
      acceleratorSampler: { name: 'gpu', sample: async () => { throw new Error('driver missing'); } },
    });
    monitor.start(1_000);
    await vi.advanceTimersByTimeAsync(1_000);
    const sample = monitor.latestSample();
    expect(sample?.powerWatts).toBe(40);
    expect(sample?.degraded).toBe(true);
    monitor.stop();
  });

  it('ignores start while running', async () => {
    const monitor = new EnergyMonitor({ cpuSampler: constantSampler(0.5), cpuTdpWatts: 100 });
    monitor.start(1_000);
    monitor.start(10);
    await vi.advanceTimersByTimeAsync(1_000);
    const session = monitor.stop();
    expect(session.sampleCount).toBe(1);
    expect(session.samplingIntervalMs).toBe(1_000);
  });

  it('returns an empty session when stopped while idle', () => {
    const monitor = new EnergyMonitor({ cpuSampler: constantSampler(0.5), cpuTdpWatts: 100 });
    const session = monitor.stop();
    expect(monitor.isRunning()).toBe(false);
    expect(session.sampleCount).toBe(0);
    expect(session.totalKwh).toBe(0);
    expect(session.samples).toEqual([]);
  });

  it('discards a tick that completes after stop', async () => {
    let release: ((value: number) => void) | undefined;
    const monitor = new EnergyMonitor({
      cpuSampler: { name: 'slow', sample: () => new Promise<number>((resolve) => { release = resolve; }) },
      cpuTdpWatts: 100,
    });

    monitor.start(1_000);
    await vi.advanceTimersByTimeAsync(1_000);
    const first = monitor.stop();
    monitor.start(1_000);
    release?.(1);
    await vi.advanceTimersByTimeAsync(0);

    expect(first.sampleCount).toBe(0);
    expect(monitor.latestSample()).toBeUndefined();
    expect(monitor.currentTotalKwh()).toBe(0);
    monitor.stop();
  });

  it('bounds history without losing totals', async () => {
    const monitor = new EnergyMonitor({ cpuSampler: constantSampler(0.5), cpuTdpWatts: 100, historyLimit: 2 });
    monitor.start(1_000);
    await vi.advanceTimersByTimeAsync(5_000);
    const session = monitor.stop();
    expect(session.samples).toHaveLength(2);
    expect(session.sampleCount).toBe(5);
    expect(session.totalKwh).toBeCloseTo(5 * FIFTY_WATT_SECOND_KWH, 15);
    expect(session.samples[1].cumulativeKwh).toBe(session.totalKwh);
  });

  it('rejects a non-positive interval', () => {
    const monitor = new EnergyMonitor({ cpuSampler: constantSampler(0.5), cpuTdpWatts: 100 });
    expect(() => monitor.start(0)).toThrow(RangeError);
  });
});

describe('withEnergyMonitor', () => {
  it('returns the callback result with the session', async () => {
    const monitor = new EnergyMonitor({ cpuSampler: constantSampler(0.5), cpuTdpWatts: 100 });
    const run = withEnergyMonitor(monitor, 1_000, async () => {
      await new Promise((resolve) => setTimeout(resolve, 2_500));
      return 'done';
    });
    await vi.advanceTimersByTimeAsync(2_500);
    const { result, session } = await run;
    expect(result).toBe('done');
    expect(session.sampleCount).toBe(2);
    expect(monitor.isRunning()).toBe(false);
  });

  it('stops the monitor when the callback throws', async () => {
    const monitor = new EnergyMonitor({ cpuSampler: constantSampler(0.5), cpuTdpWatts: 100 });
    await expect(
      withEnergyMonitor(monitor, 1_000, async () => {
        throw new Error('training crashed');
      }),
    ).rejects.toThrow('training crashed');
    expect(monitor.isRunning()).toBe(false);
  });
});
