import { ValidationError } from './errors.js';

export function requireText(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`Missing required field: ${field}`, field);
  }
  return value;
}

export function requireNumber(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`Field ${field} must be a finite number`, field);
  }
  return value;
}

export function optionalNumber(value: unknown, field: string): number | null | undefined {
  if (value === undefined || value === null) return value;
  return requireNumber(value, field);
}

export function optionalText(value: unknown, field: string): string | null | undefined {
  if (value === undefined || value === null) return value;
  if (typeof value !== 'string') {
    throw new ValidationError(`Field ${field} must be a string`, field);
  }
  return value;
}

/** True when at least one field of the patch is supplied. */
export function hasAnyField(patch: object): boolean {
  return Object.values(patch).some((v) => v !== undefined);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepts booleans, 0/1, and "true"/"false". */
export function optionalFlag(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'boolean') return value;
  if (value === 1 || value === 'true') return true;
  if (value === 0 || value === 'false') return false;
  throw new ValidationError(`Field ${field} must be a boolean`, field);
}
