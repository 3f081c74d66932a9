import { InvalidArgumentError } from '../errors.js';
import { parseFlexibleDatetime } from '../utils/time.js';

/*
 * Turns raw flag values into query request fields. `null` always means the
 * flag was not given; an explicit empty list is a different request.
 */

export function parseCsv(value: string | null | undefined): string[] | null {
  if (value == null) return null;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseOptionalDatetime(value: string | null | undefined, param = 'time'): Date | null {
  if (value == null) return null;
  const parsed = parseFlexibleDatetime(value);
  if (!parsed) {
    throw new InvalidArgumentError(
      `Unable to parse timestamp '${value}' for --${param}. Use an ISO-8601 date or datetime such as 2024-01-31 or 2024-01-31T12:00:00.`,
      param,
    );
  }
  return parsed;
}

/** An empty or blank `--where` counts as no where clause at all. */
export function parseWhereConstraint(value: string | null | undefined): string[] | null {
  return value?.trim() ? [value] : null;
}

export function parseOptionalLimit(value: number | string | null | undefined): number | null {
  if (value == null || value === '') return null;
  const limit = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError(`Invalid --limit '${value}': expected a non-negative integer.`, 'limit');
  }
  return limit;
}
