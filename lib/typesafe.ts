/**
 * Type-safe utilities for handling unknown values from API responses.
 */

import { ValidationError } from './errors';

/**
 * Type guard to check if a value is a non-null object (Record<string, unknown>)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk an envelope like `{ data: { studios: [...] } }` and return the value at `path`.
 *
 * @throws ValidationError naming the first segment that is missing
 */
export function unwrap(payload: unknown, path: readonly string[]): unknown {
  let current: unknown = payload;
  const seen: string[] = [];
  for (const key of path) {
    seen.push(key);
    if (!isRecord(current) || !(key in current)) {
      throw new ValidationError({ path: seen.join('.'), reason: 'missing from response envelope' });
    }
    current = current[key];
  }
  return current;
}

/**
 * Same as `unwrap` but insists on an array at the end of the path.
 */
export function unwrapArray(payload: unknown, path: readonly string[]): readonly unknown[] {
  const value = unwrap(payload, path);
  if (!Array.isArray(value)) {
    throw new ValidationError({ path: path.join('.') || '<root>', reason: 'expected a list', value });
  }
  return value;
}
