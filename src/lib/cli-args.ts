/**
 * Flag parsing shared by the CLI commands.
 */

import { ValidationError } from './errors.js';

export function getFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx !== -1 && args[idx + 1] && !args[idx + 1].startsWith('--')) return args[idx + 1];
  return undefined;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

/** Integer flag with bounds; absent means `fallback`. */
export function getIntFlag(args: string[], name: string, fallback: number, min = 0, max?: number): number {
  const raw = getFlag(args, name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || (max !== undefined && n > max)) {
    const bounds = max !== undefined ? `between ${min} and ${max}` : `of at least ${min}`;
    throw new ValidationError({ [name]: `Must be an integer ${bounds}` });
  }
  return n;
}
