/**
 * Typed column readers for sql.js result rows.
 */

import type { Row } from './index';

export function str(row: Row, key: string): string {
  const value = row[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new Error(`Column ${key} is not text`);
}

export function optStr(row: Row, key: string): string | null {
  const value = row[key];
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? value : String(value);
}

export function num(row: Row, key: string): number {
  const value = row[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  throw new Error(`Column ${key} is not numeric`);
}

export function optNum(row: Row, key: string): number | null {
  const value = row[key];
  if (value === null || value === undefined) return null;
  return num(row, key);
}

export function bool(row: Row, key: string): boolean {
  return Boolean(row[key]);
}

/** Read a text column constrained to a fixed set of values. */
export function oneOf<T extends string>(row: Row, key: string, values: readonly T[]): T {
  const value = row[key];
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Column ${key} has unexpected value ${String(value)}`);
  }
  return match;
}

export function optOneOf<T extends string>(row: Row, key: string, values: readonly T[]): T | null {
  const value = row[key];
  if (value === null || value === undefined) return null;
  return oneOf(row, key, values);
}
