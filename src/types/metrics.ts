// ====================
// Weekly Metrics Types
// ====================

export type Trend = 'improving' | 'declining' | 'stable';

/**
 * Raw sums for one (user, week). Everything else on WeeklyMetrics
 * is derived from these.
 */
export interface WeeklyTotals {
  user_id: string;
  week_start: number;           // Monday 00:00:00 local, Unix ms

  session_count: number;
  total_duration_seconds: number;
  total_turns: number;
  total_tool_calls: number;
  total_delegations: number;
  total_errors: number;

  tool_counts: Record<string, number>;
}

export interface WeeklyGrowth {
  sessions_change_pct: number | null;
  tools_change_pct: number | null;
  delegation_change_pct: number | null;
  error_change_pct: number | null;
}

export interface WeeklyMetrics extends WeeklyTotals, WeeklyGrowth {
  unique_tools: number;
  top_5_tools: string[];

  avg_session_duration: number;
  avg_turns_per_session: number;
  delegation_ratio: number;     // delegations per session, not bounded by 1
  error_rate: number;           // errors per tool call
}

export interface GrowthIndicators extends WeeklyGrowth {
  trend: Trend;
}
