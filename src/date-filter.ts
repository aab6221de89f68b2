/**
 * Date selection by year or timespan, on local wall-clock time
 */

import { DateTime } from 'luxon';
import { ConfigurationError, type DateCriterion } from './types.js';

const TIMESPAN_DATE_FORMAT = 'dd.MM.yyyy';

/**
 * Bounds are stored as UTC DateTimes carrying wall-clock fields, so local
 * times from any zone compare against them field by field.
 */
function wallClock(dt: DateTime): DateTime {
  return dt.setZone('utc', { keepLocalTime: true });
}

function parseBound(value: string, edge: 'start' | 'end'): DateTime | null {
  const trimmed = value.trim();
  if (trimmed === '*') {
    return null;
  }

  const parsed = DateTime.fromFormat(trimmed, TIMESPAN_DATE_FORMAT, { zone: 'utc' });
  if (!parsed.isValid) {
    throw new ConfigurationError(
      `Invalid date "${trimmed}" in timespan. Expected DD.MM.YYYY or *`
    );
  }
  return edge === 'start' ? parsed.startOf('day') : parsed.endOf('day');
}

/**
 * Parse a timespan such as "04.01.2022-31.12.2022" or "01.01.2022-*"
 */
export function parseTimespan(timespan: string): DateCriterion {
  const parts = timespan.trim().split('-');
  if (parts.length !== 2) {
    throw new ConfigurationError(
      `Invalid timespan "${timespan}". Expected DD.MM.YYYY-DD.MM.YYYY (either side may be *)`
    );
  }

  const start = parseBound(parts[0], 'start');
  const end = parseBound(parts[1], 'end');

  if (start && end && start > end) {
    throw new ConfigurationError(`Timespan "${timespan}" starts after it ends`);
  }

  return { type: 'range', start, end };
}

export function yearCriterion(year: number): DateCriterion {
  if (!Number.isInteger(year) || year < 1970 || year > 9999) {
    throw new ConfigurationError(`Invalid year: ${year}`);
  }
  return { type: 'year', year };
}

/**
 * Build the criterion from the mutually exclusive timespan/year options
 */
export function buildDateCriterion(timespan?: string, year?: number): DateCriterion {
  if (timespan !== undefined && year !== undefined) {
    throw new ConfigurationError('--timespan and --year cannot be used together');
  }
  if (timespan !== undefined) {
    return parseTimespan(timespan);
  }
  if (year !== undefined) {
    return yearCriterion(year);
  }
  return { type: 'none' };
}

/**
 * Decide whether a local capture time is selected
 */
export function include(local: DateTime, criterion: DateCriterion): boolean {
  switch (criterion.type) {
    case 'none':
      return true;
    case 'year':
      return local.year === criterion.year;
    case 'range': {
      const value = wallClock(local);
      if (criterion.start && value < criterion.start) return false;
      if (criterion.end && value > criterion.end) return false;
      return true;
    }
  }
}

/**
 * Human-readable description of a criterion
 */
export function describeCriterion(criterion: DateCriterion): string {
  switch (criterion.type) {
    case 'none':
      return 'all dates';
    case 'year':
      return `year ${criterion.year}`;
    case 'range': {
      const start = criterion.start ? criterion.start.toFormat(TIMESPAN_DATE_FORMAT) : '*';
      const end = criterion.end ? criterion.end.toFormat(TIMESPAN_DATE_FORMAT) : '*';
      return `${start} - ${end}`;
    }
  }
}
