import * as os from 'node:os';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { AcceleratorReading } from '@greengate/shared';

const execFileAsync = promisify(execFile);

/** Returns whole-machine CPU utilization in [0, 1] since the previous call. */
export interface CpuUtilizationSampler {
  readonly name: string;
  sample(): Promise<number>;
}

/** Returns combined accelerator power, or null when no device is present. */
export interface AcceleratorSampler {
  readonly name: string;
  sample(): Promise<AcceleratorReading | null>;
}

interface CpuTimes {
  idle: number;
  total: number;
}

function readCpuTimes(cpus: os.CpuInfo[] = os.cpus()): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    idle += cpuIdle;
    total += user + nice + sys + cpuIdle + irq;
  }
  return { idle, total };
}

export class OsCpuUtilizationSampler implements CpuUtilizationSampler {
  readonly name = 'os.cpus';
  private previous: CpuTimes = readCpuTimes();

  async sample(): Promise<number> {
    const current = readCpuTimes();
    const total = current.total - this.previous.total;
    const idle = current.idle - this.previous.idle;
    this.previous = current;
    if (total <= 0) return 0;
    return Math.min(1, Math.max(0, 1 - idle / total));
  }
}

/**
 * Parses `nvidia-smi --query-gpu=power.draw,utilization.gpu --format=csv,noheader,nounits`.
 * Power is summed across devices, utilization averaged. "[N/A]" fields count as 0.
 */
export function parseNvidiaSmiOutput(stdout: string): AcceleratorReading | null {
  const rows = stdout
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
  if (rows.length === 0) return null;

  let powerWatts = 0;
  let utilization = 0;
  for (const row of rows) {
    const [power, util] = row.split(',').map(field => Number.parseFloat(field.trim()));
    if (Number.isFinite(power)) powerWatts += power;
    if (Number.isFinite(util)) utilization += util / 100;
  }

  return { powerWatts, utilization: utilization / rows.length, devices: rows.length };
}

export class NvidiaSmiSampler implements AcceleratorSampler {
  readonly name = 'nvidia-smi';

  constructor(private timeoutMs = 2_000) {}

  async sample(): Promise<AcceleratorReading | null> {
    const { stdout } = await execFileAsync(
      'nvidia-smi',
      ['--query-gpu=power.draw,utilization.gpu', '--format=csv,noheader,nounits'],
      { timeout: this.timeoutMs },
    );
    return parseNvidiaSmiOutput(stdout);
  }
}

/**
 * Rough package TDP from the core count and base clock:
 * cores × (15 + (GHz − 2) × 5), clamped to [35, 200].
 */
export function estimateCpuTdp(cpus: Pick<os.CpuInfo, 'speed'>[] = os.cpus()): number {
  if (cpus.length === 0) return 65;
  const mhz = cpus[0].speed;
  if (!mhz || mhz <= 0) return cpus.length * 20;
  const ghz = mhz / 1000;
  const estimate = cpus.length * (15 + (ghz - 2) * 5);
  return Math.min(200, Math.max(35, estimate));
}
