import { describe, it, expect } from 'vitest';
import type { TrainingContext } from '@greengate/core';
import { runTrainingCommand, trainingEnv } from '../src/child.js';

function context(signal: AbortSignal = new AbortController().signal): TrainingContext {
  const config = { batchSize: 32, precision: 'mixed' as const, epochs: 5 };
  return {
    config,
    reading: { region: 'DE', intensity: 320, timestamp: '2024-05-01T02:00:00.000Z', source: 'mock' },
    signal,
    energyKwh: () => 0,
    reoptimize: async () => config,
  };
}

describe('trainingEnv', () => {
  it('adds the tuned configuration to the base environment', () => {
    expect(trainingEnv(context(), { PATH: '/usr/bin' })).toEqual({
      PATH: '/usr/bin',
      GREENGATE_BATCH_SIZE: '32',
      GREENGATE_PRECISION: 'mixed',
      GREENGATE_EPOCHS: '5',
      GREENGATE_CARBON_INTENSITY: '320',
    });
  });
});

describe('runTrainingCommand', () => {
  it('resolves when the command sees its configuration and exits 0', async () => {
    const script =
      "process.exit(process.env.GREENGATE_BATCH_SIZE === '32' && process.env.GREENGATE_PRECISION === 'mixed' ? 0 : 7)";
    await expect(
      runTrainingCommand(process.execPath, ['-e', script], context(), { stdio: 'ignore' }),
    ).resolves.toBeUndefined();
  });

  it('rejects with the exit code of a failing command', async () => {
    await expect(
      runTrainingCommand(process.execPath, ['-e', 'process.exit(3)'], context(), { stdio: 'ignore' }),
    ).rejects.toThrow(`${process.execPath} exited with code 3`);
  });

  it('terminates the command when the session aborts', async () => {
    const controller = new AbortController();
    const run = runTrainingCommand(process.execPath, ['-e', 'setTimeout(() => {}, 60000)'], context(controller.signal), {
      stdio: 'ignore',
    });
    setTimeout(() => controller.abort(), 100);
    await expect(run).rejects.toThrow(`${process.execPath} exited with signal SIGTERM`);
  });
});
