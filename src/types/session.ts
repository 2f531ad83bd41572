// ====================
// Session Types
// ====================

/**
 * One completed assistant session, as produced by the parser.
 * Immutable once stored; saving again under the same id replaces it.
 */
export interface Session {
  session_id: string;
  project_path: string;

  started_at: number;           // Unix timestamp (ms)
  ended_at: number;
  duration_seconds: number;

  turn_count: number;
  tool_call_count: number;
  delegation_count: number;
  error_count: number;

  tool_counts: Record<string, number>;  // { bash: 12, read_file: 8 }

  model_used: string;
  status: string;               // from metadata, 'completed' when absent
}

export interface ToolUsageEntry {
  tool_name: string;
  call_count: number;
}

export interface SessionDateRange {
  first: number;
  last: number;
}
