export interface EnergySample {
  timestamp: string;
  powerWatts: number;
  cpuPowerWatts: number;
  acceleratorPowerWatts: number;
  /** 0..1 */
  cpuUtilization: number;
  cumulativeKwh: number;
  degraded: boolean;
}

export interface EnergySession {
  startedAt: string;
  endedAt: string;
  durationSeconds: number;
  samplingIntervalMs: number;
  samples: EnergySample[];
  sampleCount: number;
  totalKwh: number;
  averagePowerWatts: number;
  peakPowerWatts: number;
  cpuTdpWatts: number;
  degradedSamples: number;
}

export interface AcceleratorReading {
  powerWatts: number;
  /** 0..1 */
  utilization: number;
  devices: number;
}
