import { spawn, type StdioOptions } from 'node:child_process';
import type { TrainingContext } from '@greengate/core';

export interface ChildOptions {
  stdio?: StdioOptions;
  env?: NodeJS.ProcessEnv;
}

/** Environment handed to the training command. */
export function trainingEnv(ctx: Pick<TrainingContext, 'config' | 'reading'>, base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  return {
    ...base,
    GREENGATE_BATCH_SIZE: String(ctx.config.batchSize),
    GREENGATE_PRECISION: ctx.config.precision,
    GREENGATE_EPOCHS: String(ctx.config.epochs),
    GREENGATE_CARBON_INTENSITY: String(ctx.reading.intensity),
  };
}

/** Runs the training command; the child is sent SIGTERM when the session aborts. */
export function runTrainingCommand(
  command: string,
  args: string[],
  ctx: TrainingContext,
  options: ChildOptions = {},
): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: options.stdio ?? 'inherit',
      env: trainingEnv(ctx, options.env),
    });

    const onAbort = () => {
      child.kill('SIGTERM');
    };
    if (ctx.signal.aborted) onAbort();
    else ctx.signal.addEventListener('abort', onAbort, { once: true });

    const cleanup = () => ctx.signal.removeEventListener('abort', onAbort);

    child.once('error', (err) => {
      cleanup();
      reject(err);
    });
    child.once('exit', (code, signal) => {
      cleanup();
      if (code === 0) resolve();
      else reject(new Error(`${command} exited with ${code !== null ? `code ${code}` : `signal ${signal}`}`));
    });
  });
}
