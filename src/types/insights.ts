// ====================
// Insights Query Types
// ====================

import type { Trend } from './metrics.js';
import type { RuleTip } from './tips.js';

export type TimeRange = 'this_week' | 'last_week';

export type GrowthArea = 'delegation' | 'tool_diversity' | 'error_handling';

export interface InsightsSummary {
  summary: string;
  metrics: {
    sessions: {
      count: number;
      change: string;
      total_duration: string;
    };
    tools: {
      unique: number;
      top_5: string[];
      total_calls: number;
    };
    effectiveness: {
      avg_duration: string;
      delegation_ratio: number;
      error_rate: number;
    };
  };
  growth: {
    trend: Trend;
    strongest_area: GrowthArea | 'unknown';
    areas_to_improve: GrowthArea[];
  };
  tips: RuleTip[];
}

export interface ToolUsageReport {
  total_calls: number;
  unique_tools: number;
  top_tools: Array<[string, number]>;
}

export interface GrowthReport {
  current_week_sessions: number;
  previous_week_sessions: number;
  sessions_change: string;
  delegation_change: string;
  tools_change: string;
  error_change: string;
  trend: Trend;
}

export type PersonalInsightsData = InsightsSummary | ToolUsageReport | GrowthReport;

export interface PersonalInsightsResult {
  response: string;
  data: PersonalInsightsData | Record<string, never>;
}

export interface RefreshFailure {
  session_dir: string;
  error: string;
}

export interface RefreshResult {
  found: number;
  processed: number;
  failures: RefreshFailure[];
  weeks_computed: number[];
}
