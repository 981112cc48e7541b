/**
 * Utility functions for environment variable parsing
 */

const TRUTHY = ['1', 'true', 'yes', 'on'];
const FALSY = ['0', 'false', 'no', 'off'];

/**
 * Parse a boolean environment variable that accepts multiple truthy/falsy values:
 * - Truthy: "1", "true", "yes", "on" (case insensitive)
 * - Falsy: "0", "false", "no", "off" (case insensitive) or undefined/empty
 *
 * Unknown values fall back to `defaultValue`.
 */
export function parseBooleanEnv(envVar: string | undefined, defaultValue = false): boolean {
  if (!envVar) return defaultValue;
  const normalized = envVar.toLowerCase().trim();
  if (TRUTHY.includes(normalized)) return true;
  if (FALSY.includes(normalized)) return false;
  return defaultValue;
}

export function getBooleanEnv(name: string, defaultValue = false, env: NodeJS.ProcessEnv = process.env): boolean {
  return parseBooleanEnv(env[name], defaultValue);
}

/** Integer env value; non-numeric or non-finite input yields the default. */
export function getIntEnv(name: string, defaultValue: number, env: NodeJS.ProcessEnv = process.env): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return defaultValue;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : defaultValue;
}

export function getStringEnv(name: string, defaultValue: string, env: NodeJS.ProcessEnv = process.env): string {
  const raw = env[name];
  if (raw && raw.trim().length) return raw.trim();
  return defaultValue;
}

/** Constrain a raw env value to one of `allowed`, otherwise return the default. */
export function getEnumEnv<T extends string>(name: string, allowed: readonly T[], defaultValue: T, env: NodeJS.ProcessEnv = process.env): T {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return defaultValue;
  const match = allowed.find(a => a === raw);
  return match ?? defaultValue;
}
