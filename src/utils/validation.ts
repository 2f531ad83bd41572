/**
 * Validation Utilities
 * Input validation for MCP tool arguments and CLI options
 */

import { ValidationError } from '../types/index.js';
import type { TimeRange } from '../types/index.js';
import {
  DEFAULT_INSIGHTS_QUERY,
  INSIGHTS_QUERY_MAX_LENGTH,
  WEEKS_TO_COMPUTE_MAX,
} from './constants.js';

const VALID_TIME_RANGES: TimeRange[] = ['this_week', 'last_week'];

export interface InsightsQueryArgs {
  query: string;
}

/**
 * Validate get_usage_insights arguments
 * Missing args or a missing/blank query fall back to the default question.
 */
export function validateInsightsQuery(args: unknown): InsightsQueryArgs {
  if (args === undefined || args === null) {
    return { query: DEFAULT_INSIGHTS_QUERY };
  }

  if (typeof args !== 'object' || Array.isArray(args)) {
    throw new ValidationError('Invalid arguments: must be an object');
  }

  const query: unknown = 'query' in args ? args.query : undefined;

  if (query === undefined || query === null) {
    return { query: DEFAULT_INSIGHTS_QUERY };
  }

  if (typeof query !== 'string') {
    throw new ValidationError('query must be a string');
  }

  if (query.length > INSIGHTS_QUERY_MAX_LENGTH) {
    throw new ValidationError(`query must be ${INSIGHTS_QUERY_MAX_LENGTH} characters or less`);
  }

  const trimmed = query.trim();
  return { query: trimmed.length > 0 ? trimmed : DEFAULT_INSIGHTS_QUERY };
}

function isTimeRange(value: string): value is TimeRange {
  return VALID_TIME_RANGES.some((range) => range === value);
}

/**
 * Validate a week selector
 */
export function validateTimeRange(value: unknown): TimeRange {
  if (typeof value !== 'string' || !isTimeRange(value)) {
    throw new ValidationError(`time range must be one of: ${VALID_TIME_RANGES.join(', ')}`, { value });
  }
  return value;
}

/**
 * Validate the number of recent weeks to recompute.
 * Accepts numbers and numeric strings (commander passes strings).
 */
export function validateWeeks(value: unknown): number {
  const weeks = typeof value === 'string' ? Number(value.trim()) : value;

  if (typeof weeks !== 'number' || !Number.isInteger(weeks)) {
    throw new ValidationError('weeks must be an integer', { value });
  }

  if (weeks < 1 || weeks > WEEKS_TO_COMPUTE_MAX) {
    throw new ValidationError(`weeks must be between 1 and ${WEEKS_TO_COMPUTE_MAX}`, { value });
  }

  return weeks;
}
