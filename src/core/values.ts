/**
 * core/values.ts
 *
 * Narrowing helpers for the two places untyped data enters the process:
 * tool arguments (already checked against the tool schema by the registry,
 * but still `unknown` to the compiler) and JSON printed by PowerShell / WMI.
 */

import { ValidationError } from './errors';

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** ConvertTo-Json prints a bare object for one row and an array for several. */
export function toRecordArray(value: unknown): UnknownRecord[] {
  if (Array.isArray(value)) return value.filter(isRecord);
  if (isRecord(value)) return [value];
  return [];
}

// ---------------------------------------------------------------------------
// WMI record fields
// ---------------------------------------------------------------------------

export function field(rec: UnknownRecord | null | undefined, key: string): string {
  if (!rec) return '';
  const v = rec[key];
  if (typeof v === 'string') return v.trim();
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  return '';
}

export function numField(rec: UnknownRecord | null | undefined, key: string): number | null {
  if (!rec) return null;
  const v = rec[key];
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Tool arguments
// ---------------------------------------------------------------------------

export function optionalString(toolName: string, args: UnknownRecord, key: string): string | undefined {
  const v = args[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'string') {
    throw new ValidationError(toolName, [{ argument: key, expected: 'string' }]);
  }
  return v;
}

export function optionalBoolean(toolName: string, args: UnknownRecord, key: string): boolean | undefined {
  const v = args[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'boolean') {
    throw new ValidationError(toolName, [{ argument: key, expected: 'boolean' }]);
  }
  return v;
}

export function optionalNumber(toolName: string, args: UnknownRecord, key: string): number | undefined {
  const v = args[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'number' || !Number.isFinite(v)) {
    throw new ValidationError(toolName, [{ argument: key, expected: 'number' }]);
  }
  return v;
}

export function optionalStringArray(toolName: string, args: UnknownRecord, key: string): string[] | undefined {
  const v = args[key];
  if (v === undefined) return undefined;
  if (!Array.isArray(v) || !v.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(toolName, [{ argument: key, expected: 'string[]' }]);
  }
  return v;
}
