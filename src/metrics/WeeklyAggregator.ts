/**
 * Weekly Aggregator
 * Folds the sessions of one week into a WeeklyMetrics rollup and attaches
 * growth against the previous week's stored rollup.
 */

import type { MetricsStore, Session, WeeklyMetrics } from '../types/index.js';
import { LOCAL_USER_ID } from '../utils/constants.js';
import { addDays, addWeeks, getWeekStart, previousWeekStart } from '../utils/time.js';
import { deriveWeeklyMetrics, emptyWeeklyMetrics, mergeToolCounts } from './derive.js';
import { calculateGrowth } from './growth.js';

/**
 * Aggregate sessions already filtered to [weekStart, weekStart + 7d).
 */
export function aggregateSessions(
  sessions: readonly Session[],
  weekStart: number,
  previous: WeeklyMetrics | null,
  userId: string = LOCAL_USER_ID
): WeeklyMetrics {
  if (sessions.length === 0) {
    return emptyWeeklyMetrics(userId, weekStart);
  }

  let totalDuration = 0;
  let totalTurns = 0;
  let totalToolCalls = 0;
  let totalDelegations = 0;
  let totalErrors = 0;

  for (const session of sessions) {
    totalDuration += session.duration_seconds;
    totalTurns += session.turn_count;
    totalToolCalls += session.tool_call_count;
    totalDelegations += session.delegation_count;
    totalErrors += session.error_count;
  }

  const current = deriveWeeklyMetrics({
    user_id: userId,
    week_start: weekStart,
    session_count: sessions.length,
    total_duration_seconds: totalDuration,
    total_turns: totalTurns,
    total_tool_calls: totalToolCalls,
    total_delegations: totalDelegations,
    total_errors: totalErrors,
    tool_counts: Object.fromEntries(mergeToolCounts(sessions)),
  });

  const growth = calculateGrowth(current, previous);
  return {
    ...current,
    sessions_change_pct: growth.sessions_change_pct,
    tools_change_pct: growth.tools_change_pct,
    delegation_change_pct: growth.delegation_change_pct,
    error_change_pct: growth.error_change_pct,
  };
}

export interface WeeklyAggregatorOptions {
  userId?: string;
}

export class WeeklyAggregator {
  private userId: string;

  constructor(private store: MetricsStore, options: WeeklyAggregatorOptions = {}) {
    this.userId = options.userId ?? LOCAL_USER_ID;
  }

  /**
   * Compute (without saving) the rollup for the week starting at `weekStart`
   */
  calculateWeek(weekStart: number): WeeklyMetrics {
    const sessions = this.store.getSessionsInRange(weekStart, addDays(weekStart, 7));
    const previous = this.store.getWeeklyMetrics(previousWeekStart(weekStart), this.userId);
    return aggregateSessions(sessions, weekStart, previous, this.userId);
  }

  computeAndSave(weekStart: number): WeeklyMetrics {
    const metrics = this.calculateWeek(weekStart);
    this.store.saveWeeklyMetrics(metrics);
    return metrics;
  }

  /**
   * Recompute the last `weeks` weeks ending with the week containing `now`.
   * Runs oldest first so each week's growth reads a freshly saved predecessor.
   * Returns the week starts computed, oldest first.
   */
  recomputeRecentWeeks(now: number, weeks: number): number[] {
    const currentWeek = getWeekStart(now);
    const computed: number[] = [];
    for (let offset = weeks - 1; offset >= 0; offset--) {
      const weekStart = addWeeks(currentWeek, -offset);
      this.computeAndSave(weekStart);
      computed.push(weekStart);
    }
    return computed;
  }
}
