import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Expand a leading `~` to the current user's home directory.
 */
export function expandPath(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function getEnvString(key: string): string | undefined;
export function getEnvString(key: string, defaultValue: string): string;
export function getEnvString(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value === undefined ? defaultValue : value;
}

/**
 * Integer reader (parseInt semantics). Non-numeric values fall back to the default.
 */
export function getEnvNumber(key: string): number | undefined;
export function getEnvNumber(key: string, defaultValue: number): number;
export function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

export function getEnvFloat(key: string): number | undefined;
export function getEnvFloat(key: string, defaultValue: number): number;
export function getEnvFloat(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

export function getEnvBoolean(key: string): boolean | undefined;
export function getEnvBoolean(key: string, defaultValue: boolean): boolean;
export function getEnvBoolean(key: string, defaultValue?: boolean): boolean | undefined {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return defaultValue;
}

export function requireEnvString(key: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    throw new Error(`Required environment variable ${key} is not defined`);
  }
  return value;
}
