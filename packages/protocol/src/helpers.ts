import { DEFAULT_DUE_OFFSET } from './constants.js';

/**
 * Fields of a patch record that are actually set, in `order`.
 *
 * `undefined` means "not set"; `null` is a set value (clear the field).
 */
export function presentFields<T extends object, K extends keyof T>(patch: T, order: readonly K[]): K[] {
  return order.filter((field) => patch[field] !== undefined);
}

/**
 * Canonical key for a query's parameters. Two queries share a key only
 * when they would return the same result set, so a cursor tagged with one
 * key must not be replayed against another.
 */
export function canonicalQueryKey(query: object): string {
  const entries: Array<[string, unknown]> = Object.entries(query);
  const normalized = entries
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => [key, Array.isArray(value) ? [...value].map(String).sort() : value]);
  return JSON.stringify(normalized);
}

/** Expand a bare `YYYY-MM-DD` date to the last second of that day at `offset` */
export function endOfDay(date: string, offset: string = DEFAULT_DUE_OFFSET): string | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) return null;
  if (!/^(Z|[+-]\d{2}:\d{2})$/.test(offset)) return null;
  return `${date}T23:59:59${offset}`;
}
