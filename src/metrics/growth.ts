/**
 * Week-over-week growth
 */

import type { GrowthIndicators, Trend, WeeklyMetrics } from '../types/index.js';
import { SESSION_GROWTH_THRESHOLD_PCT } from '../utils/constants.js';

type GrowthInput = Pick<WeeklyMetrics, 'session_count' | 'unique_tools' | 'delegation_ratio' | 'error_rate'>;

/**
 * Percent change from `previous` to `current`.
 * A zero baseline yields 100 for any positive current value, else 0.
 */
export function percentChange(current: number, previous: number): number {
  if (previous === 0) {
    return current > 0 ? 100 : 0;
  }
  return ((current - previous) / previous) * 100;
}

/**
 * Four-point scoreboard:
 *   sessions up more than 10%, delegation ratio up, error rate down, tool diversity up.
 * Only the sessions criterion uses the percentage; the rest compare raw values.
 */
export function scoreTrend(current: GrowthInput, previous: GrowthInput, sessionsChangePct: number): Trend {
  let score = 0;
  if (sessionsChangePct > SESSION_GROWTH_THRESHOLD_PCT) score += 1;
  if (current.delegation_ratio > previous.delegation_ratio) score += 1;
  if (current.error_rate < previous.error_rate) score += 1;
  if (current.unique_tools > previous.unique_tools) score += 1;

  if (score >= 3) return 'improving';
  if (score <= 1) return 'declining';
  return 'stable';
}

export function calculateGrowth(current: GrowthInput, previous: GrowthInput | null): GrowthIndicators {
  if (previous === null) {
    return {
      sessions_change_pct: null,
      tools_change_pct: null,
      delegation_change_pct: null,
      error_change_pct: null,
      trend: 'stable',
    };
  }

  const sessionsChange = percentChange(current.session_count, previous.session_count);

  return {
    sessions_change_pct: sessionsChange,
    tools_change_pct: percentChange(current.unique_tools, previous.unique_tools),
    delegation_change_pct: percentChange(current.delegation_ratio, previous.delegation_ratio),
    error_change_pct: percentChange(current.error_rate, previous.error_rate),
    trend: scoreTrend(current, previous, sessionsChange),
  };
}
