import { GreenGateError } from '@greengate/shared';
import { GreenGate } from '@greengate/core';

export interface CommonOptions {
  config?: string;
  json?: boolean;
}

export function openGreenGate(options: CommonOptions, overrides?: Record<string, unknown>): Promise<GreenGate> {
  return GreenGate.create({ configPath: options.config, overrides });
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Wraps a command action: known errors are printed and set exit code 1,
 * anything else propagates to commander.
 */
export function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof GreenGateError) {
        console.error(`Error: ${err.message}`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }
  };
}
