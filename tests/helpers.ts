import { mkdirSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Session, WeeklyMetrics } from '../src/types/index.js';
import { deriveWeeklyMetrics } from '../src/metrics/derive.js';

export function makeTempDir(prefix: string): string {
  const dir = join(tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

/** Mon 2024-01-08 00:00 local time */
export const WEEK_START = new Date(2024, 0, 8).getTime();
/** Mon 2024-01-01 00:00 local time */
export const PREV_WEEK_START = new Date(2024, 0, 1).getTime();

export function makeSession(overrides: Partial<Session> = {}): Session {
  const startedAt = overrides.started_at ?? new Date(2024, 0, 9, 10, 0).getTime();
  const toolCounts = overrides.tool_counts ?? { read_file: 3, bash: 2 };
  const toolCallCount = overrides.tool_call_count
    ?? Object.values(toolCounts).reduce((sum, n) => sum + n, 0);

  return {
    session_id: 'session-1',
    project_path: '/work/demo',
    started_at: startedAt,
    ended_at: startedAt + 1_800_000,
    duration_seconds: 1800,
    turn_count: 4,
    delegation_count: 0,
    error_count: 0,
    model_used: 'test-model',
    status: 'completed',
    ...overrides,
    tool_counts: toolCounts,
    tool_call_count: toolCallCount,
  };
}

/**
 * Build a WeeklyMetrics from sums, with growth fields left null
 */
export function makeWeek(overrides: {
  week_start?: number;
  session_count?: number;
  total_duration_seconds?: number;
  total_turns?: number;
  total_tool_calls?: number;
  total_delegations?: number;
  total_errors?: number;
  tool_counts?: Record<string, number>;
} = {}): WeeklyMetrics {
  return deriveWeeklyMetrics({
    user_id: 'local',
    week_start: overrides.week_start ?? WEEK_START,
    session_count: overrides.session_count ?? 0,
    total_duration_seconds: overrides.total_duration_seconds ?? 0,
    total_turns: overrides.total_turns ?? 0,
    total_tool_calls: overrides.total_tool_calls ?? 0,
    total_delegations: overrides.total_delegations ?? 0,
    total_errors: overrides.total_errors ?? 0,
    tool_counts: overrides.tool_counts ?? {},
  });
}

/**
 * Write a session directory under <projectsDir>/<project>/sessions/<id>
 */
export function writeSessionDir(
  projectsDir: string,
  project: string,
  sessionId: string,
  files: { events?: unknown[]; transcript?: unknown[]; metadata?: unknown | string }
): string {
  const dir = join(projectsDir, project, 'sessions', sessionId);
  mkdirSync(dir, { recursive: true });

  if (files.events) {
    writeFileSync(join(dir, 'events.jsonl'), files.events.map((e) => JSON.stringify(e)).join('\n') + '\n');
  }
  if (files.transcript) {
    writeFileSync(join(dir, 'transcript.jsonl'), files.transcript.map((t) => JSON.stringify(t)).join('\n') + '\n');
  }
  if (files.metadata !== undefined) {
    const body = typeof files.metadata === 'string' ? files.metadata : JSON.stringify(files.metadata);
    writeFileSync(join(dir, 'metadata.json'), body);
  }
  return dir;
}
