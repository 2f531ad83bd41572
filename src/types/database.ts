// ====================
// Database Config Types
// ====================

export interface DatabaseConfig {
  filename?: string;
  dataDir?: string;
}

// ====================
// SQLite Row Types
// ====================

export interface SessionRow {
  session_id: string;
  project_path: string;
  started_at: number;
  ended_at: number;
  duration_seconds: number;
  turn_count: number;
  tool_call_count: number;
  delegation_count: number;
  error_count: number;
  model_used: string | null;
  status: string;
  created_at: number;
}

export interface SessionToolRow {
  session_id: string;
  tool_name: string;
  call_count: number;
}

export interface WeeklyMetricsRow {
  user_id: string;
  week_start: number;
  session_count: number;
  total_duration_seconds: number;
  total_turns: number;
  total_tool_calls: number;
  total_delegations: number;
  total_errors: number;
  unique_tools: number;
  tool_counts: string;          // JSON object, insertion order preserved
  top_5_tools: string;          // JSON array
  avg_session_duration: number;
  avg_turns_per_session: number;
  delegation_ratio: number;
  error_rate: number;
  sessions_change_pct: number | null;
  tools_change_pct: number | null;
  delegation_change_pct: number | null;
  error_change_pct: number | null;
  computed_at: number;
}

export interface CountRow {
  count: number;
}

export interface DateRangeRow {
  first: number | null;
  last: number | null;
}
