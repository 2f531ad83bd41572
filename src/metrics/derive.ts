/**
 * Derived weekly fields
 * Everything here is a pure function of WeeklyTotals, so a stored rollup
 * can always be rebuilt from its sums.
 */

import type { Session, WeeklyGrowth, WeeklyMetrics, WeeklyTotals } from '../types/index.js';
import { TOP_TOOLS_LIMIT } from '../utils/constants.js';

export const NO_GROWTH: WeeklyGrowth = {
  sessions_change_pct: null,
  tools_change_pct: null,
  delegation_change_pct: null,
  error_change_pct: null,
};

/**
 * Sum per-tool counts across sessions.
 * Keys keep the order in which they were first seen.
 */
export function mergeToolCounts(sessions: ReadonlyArray<Pick<Session, 'tool_counts'>>): Map<string, number> {
  const merged = new Map<string, number>();
  for (const session of sessions) {
    for (const [toolName, count] of Object.entries(session.tool_counts)) {
      merged.set(toolName, (merged.get(toolName) ?? 0) + count);
    }
  }
  return merged;
}

/**
 * Tool names by descending count. Array.prototype.sort is stable,
 * so ties stay in first-seen order.
 */
export function rankTools(toolCounts: Map<string, number>, limit: number = TOP_TOOLS_LIMIT): string[] {
  return [...toolCounts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([toolName]) => toolName);
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

export function deriveWeeklyMetrics(totals: WeeklyTotals, growth: WeeklyGrowth = NO_GROWTH): WeeklyMetrics {
  const toolCounts = new Map(Object.entries(totals.tool_counts));

  return {
    ...totals,
    unique_tools: toolCounts.size,
    top_5_tools: rankTools(toolCounts),
    avg_session_duration: ratio(totals.total_duration_seconds, totals.session_count),
    avg_turns_per_session: ratio(totals.total_turns, totals.session_count),
    delegation_ratio: ratio(totals.total_delegations, totals.session_count),
    error_rate: ratio(totals.total_errors, totals.total_tool_calls),
    ...growth,
  };
}

export function emptyWeeklyMetrics(userId: string, weekStart: number): WeeklyMetrics {
  return deriveWeeklyMetrics({
    user_id: userId,
    week_start: weekStart,
    session_count: 0,
    total_duration_seconds: 0,
    total_turns: 0,
    total_tool_calls: 0,
    total_delegations: 0,
    total_errors: 0,
    tool_counts: {},
  });
}
