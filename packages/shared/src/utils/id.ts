import { randomBytes } from 'node:crypto';

export function generateId(prefix: string): string {
  return `${prefix}_${Date.now().toString(36)}${randomBytes(4).toString('hex')}`;
}
