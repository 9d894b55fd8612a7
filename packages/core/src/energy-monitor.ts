import {
  type Clock,
  type EnergySample,
  type EnergySession,
  type Logger,
  MonitorFailureError,
  silentLogger,
  systemClock,
} from '@greengate/shared';
import {
  type AcceleratorSampler,
  type CpuUtilizationSampler,
  OsCpuUtilizationSampler,
  estimateCpuTdp,
} from './energy-samplers.js';

export interface EnergyMonitorOptions {
  cpuSampler?: CpuUtilizationSampler;
  acceleratorSampler?: AcceleratorSampler;
  /** Overrides the estimated CPU TDP. */
  cpuTdpWatts?: number;
  idleFraction?: number;
  maxFraction?: number;
  /** Used for ticks whose CPU sample failed; defaults to half the TDP. */
  fallbackPowerWatts?: number;
  historyLimit?: number;
  clock?: Clock;
  logger?: Logger;
}

interface ActiveSession {
  token: number;
  startedAt: Date;
  intervalMs: number;
  samples: EnergySample[];
  sampleCount: number;
  totalKwh: number;
  powerSum: number;
  peakPowerWatts: number;
  degradedSamples: number;
  failureLogged: boolean;
}

interface Measurement {
  cpuUtilization: number;
  cpuPowerWatts: number;
  acceleratorPowerWatts: number;
  degraded: boolean;
}

const MS_PER_HOUR = 3_600_000;

/**
 * Background power sampler. Each tick converts utilization to watts and
 * integrates energy over the configured interval.
 */
export class EnergyMonitor {
  readonly cpuTdpWatts: number;
  private cpuSampler: CpuUtilizationSampler;
  private acceleratorSampler?: AcceleratorSampler;
  private idleWatts: number;
  private maxWatts: number;
  private fallbackPowerWatts: number;
  private historyLimit: number;
  private clock: Clock;
  private logger: Logger;

  private timer: ReturnType<typeof setInterval> | null = null;
  private session: ActiveSession | null = null;
  private nextToken = 0;
  private tickInFlight = false;

  constructor(options: EnergyMonitorOptions = {}) {
    this.cpuSampler = options.cpuSampler ?? new OsCpuUtilizationSampler();
    this.acceleratorSampler = options.acceleratorSampler;
    this.cpuTdpWatts = options.cpuTdpWatts ?? estimateCpuTdp();
    this.idleWatts = (options.idleFraction ?? 0) * this.cpuTdpWatts;
    this.maxWatts = (options.maxFraction ?? 1) * this.cpuTdpWatts;
    this.fallbackPowerWatts = options.fallbackPowerWatts ?? this.cpuTdpWatts * 0.5;
    this.historyLimit = options.historyLimit ?? 3_600;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  isRunning(): boolean {
    return this.session !== null;
  }

  start(samplingIntervalMs: number): void {
    if (this.session) {
      this.logger.warn('Energy monitor already running; start ignored');
      return;
    }
    if (!Number.isFinite(samplingIntervalMs) || samplingIntervalMs <= 0) {
      throw new RangeError(`samplingIntervalMs must be positive, got ${samplingIntervalMs}`);
    }

    const session: ActiveSession = {
      token: ++this.nextToken,
      startedAt: this.clock.now(),
      intervalMs: samplingIntervalMs,
      samples: [],
      sampleCount: 0,
      totalKwh: 0,
      powerSum: 0,
      peakPowerWatts: 0,
      degradedSamples: 0,
      failureLogged: false,
    };
    this.session = session;
    this.tickInFlight = false;

    this.timer = setInterval(() => {
      this.tick(session.token).catch((err: unknown) => {
        this.logger.error(`Energy monitor tick failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, samplingIntervalMs);
    this.timer.unref();
    this.logger.debug(`Energy monitor started (${samplingIntervalMs} ms, TDP ${this.cpuTdpWatts.toFixed(0)} W)`);
  }

  stop(): EnergySession {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    const session = this.session;
    this.session = null;

    const endedAt = this.clock.now();
    if (!session) {
      return this.emptySession(endedAt);
    }

    const durationSeconds = Math.max(0, (endedAt.getTime() - session.startedAt.getTime()) / 1000);
    this.logger.debug(`Energy monitor stopped: ${session.totalKwh.toFixed(6)} kWh over ${session.sampleCount} samples`);
    return {
      startedAt: session.startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      durationSeconds,
      samplingIntervalMs: session.intervalMs,
      samples: [...session.samples],
      sampleCount: session.sampleCount,
      totalKwh: session.totalKwh,
      averagePowerWatts: session.sampleCount > 0 ? session.powerSum / session.sampleCount : 0,
      peakPowerWatts: session.peakPowerWatts,
      cpuTdpWatts: this.cpuTdpWatts,
      degradedSamples: session.degradedSamples,
    };
  }

  currentTotalKwh(): number {
    return this.session?.totalKwh ?? 0;
  }

  latestSample(): EnergySample | undefined {
    const samples = this.session?.samples;
    return samples ? samples[samples.length - 1] : undefined;
  }

  private async tick(token: number): Promise<void> {
    if (this.tickInFlight) return;
    this.tickInFlight = true;
    try {
      const measurement = await this.measure(token);
      // A tick that outlived its session must not touch the next one.
      const session = this.session;
      if (!session || session.token !== token) return;
      this.record(session, measurement);
    } finally {
      if (this.session?.token === token) this.tickInFlight = false;
    }
  }

  private async measure(token: number): Promise<Measurement> {
    let cpuUtilization = 0;
    let cpuPowerWatts: number;
    let degraded = false;

    try {
      const raw = await this.cpuSampler.sample();
      cpuUtilization = Number.isFinite(raw) ? Math.min(1, Math.max(0, raw)) : 0;
      cpuPowerWatts = this.idleWatts + (this.maxWatts - this.idleWatts) * cpuUtilization;
    } catch (err) {
      this.reportFailure(token, new MonitorFailureError(this.cpuSampler.name, err));
      cpuPowerWatts = this.fallbackPowerWatts;
      degraded = true;
    }

    let acceleratorPowerWatts = 0;
    if (this.acceleratorSampler) {
      try {
        const reading = await this.acceleratorSampler.sample();
        acceleratorPowerWatts = reading ? Math.max(0, reading.powerWatts) : 0;
      } catch (err) {
        this.reportFailure(token, new MonitorFailureError(this.acceleratorSampler.name, err));
        degraded = true;
      }
    }

    return { cpuUtilization, cpuPowerWatts, acceleratorPowerWatts, degraded };
  }

  private record(session: ActiveSession, m: Measurement): void {
    const powerWatts = m.cpuPowerWatts + m.acceleratorPowerWatts;
    session.totalKwh += (powerWatts * (session.intervalMs / MS_PER_HOUR)) / 1000;
    session.sampleCount += 1;
    session.powerSum += powerWatts;
    session.peakPowerWatts = Math.max(session.peakPowerWatts, powerWatts);
    if (m.degraded) session.degradedSamples += 1;

    session.samples.push({
      timestamp: this.clock.now().toISOString(),
      powerWatts,
      cpuPowerWatts: m.cpuPowerWatts,
      acceleratorPowerWatts: m.acceleratorPowerWatts,
      cpuUtilization: m.cpuUtilization,
      cumulativeKwh: session.totalKwh,
      degraded: m.degraded,
    });
    if (session.samples.length > this.historyLimit) {
      session.samples.splice(0, session.samples.length - this.historyLimit);
    }
  }

  private reportFailure(token: number, error: MonitorFailureError): void {
    const session = this.session;
    if (!session || session.token !== token || session.failureLogged) return;
    session.failureLogged = true;
    this.logger.warn(`${error.message}; using estimated power for degraded samples`);
  }

  private emptySession(at: Date): EnergySession {
    const iso = at.toISOString();
    return {
      startedAt: iso,
      endedAt: iso,
      durationSeconds: 0,
      samplingIntervalMs: 0,
      samples: [],
      sampleCount: 0,
      totalKwh: 0,
      averagePowerWatts: 0,
      peakPowerWatts: 0,
      cpuTdpWatts: this.cpuTdpWatts,
      degradedSamples: 0,
    };
  }
}

/** Runs `fn` inside a monitoring session and always stops the monitor afterwards. */
export async function withEnergyMonitor<T>(
  monitor: EnergyMonitor,
  samplingIntervalMs: number,
  fn: (monitor: EnergyMonitor) => Promise<T>,
): Promise<{ result: T; session: EnergySession }> {
  monitor.start(samplingIntervalMs);
  let session: EnergySession | undefined;
  try {
    const result = await fn(monitor);
    session = monitor.stop();
    return { result, session };
  } finally {
    if (!session) monitor.stop();
  }
}
