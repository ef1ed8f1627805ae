/**
 * Typed reads over open payload maps.
 * Values of the wrong type read as the default.
 */

import type { PayloadMap } from '../store/types';

export function isRecord(value: unknown): value is PayloadMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(map: PayloadMap, key: string, defaultValue = ''): string {
  const value = map[key];
  return typeof value === 'string' ? value : defaultValue;
}

export function readOptionalNumber(map: PayloadMap, key: string): number | undefined {
  const value = map[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readNumber(map: PayloadMap, key: string, defaultValue = 0): number {
  return readOptionalNumber(map, key) ?? defaultValue;
}

export function readBoolean(map: PayloadMap, key: string, defaultValue = false): boolean {
  const value = map[key];
  return typeof value === 'boolean' ? value : defaultValue;
}

export function readStringArray(map: PayloadMap, key: string): string[] {
  const value = map[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

export function readRecord(map: PayloadMap, key: string): PayloadMap | undefined {
  const value = map[key];
  return isRecord(value) ? value : undefined;
}

export function readRecordArray(map: PayloadMap, key: string): PayloadMap[] {
  const value = map[key];
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord);
}
