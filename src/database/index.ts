/**
 * Database Manager
 * Simple SQLite operations with WAL mode for sessions and weekly rollups
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
import { DatabaseError } from '../types/index.js';
import type {
  DatabaseConfig,
  MetricsStore,
  Session,
  SessionDateRange,
  SessionRow,
  SessionToolRow,
  ToolUsageEntry,
  WeeklyMetrics,
  WeeklyMetricsRow,
  CountRow,
  DateRangeRow,
} from '../types/index.js';
import { deriveWeeklyMetrics } from '../metrics/derive.js';
import { getDefaultDataDir } from '../utils/config.js';
import { DEFAULT_DB_FILENAME, LOCAL_USER_ID } from '../utils/constants.js';

export type { DatabaseConfig } from '../types/index.js';

/**
 * Parse a JSON tool-count object, dropping anything that is not a number
 */
function parseToolCounts(json: string): Record<string, number> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new DatabaseError('Corrupt tool_counts column', {
      error: err instanceof Error ? err.message : String(err),
    });
  }

  const counts = new Map<string, number>();
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    for (const [toolName, count] of Object.entries(parsed)) {
      if (typeof count === 'number') counts.set(toolName, count);
    }
  }
  return Object.fromEntries(counts);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DatabaseManager implements MetricsStore {
  private db: Database.Database;
  private dataDir: string;
  private dbPath: string;

  constructor(config: DatabaseConfig = {}) {
    // Default to ~/.session-insights
    this.dataDir = config.dataDir || getDefaultDataDir();

    // Ensure data directory exists
    if (!fs.existsSync(this.dataDir)) {
      fs.mkdirSync(this.dataDir, { recursive: true });
    }

    this.dbPath = path.join(this.dataDir, config.filename || DEFAULT_DB_FILENAME);

    try {
      this.db = new Database(this.dbPath);
      this.initialize();
    } catch (error) {
      throw new DatabaseError('Failed to initialize database', {
        path: this.dbPath,
        error: errorMessage(error),
      });
    }
  }

  private initialize(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.pragma('foreign_keys = ON');

    this.createTables();
  }

  private createTables(): void {
    const schemaPath = path.join(__dirname, 'schema.sql');
    const schema = fs.readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
  }

  getPath(): string {
    return this.dbPath;
  }

  /**
   * Execute a transaction
   * All operations run atomically
   */
  transaction<T>(fn: () => T): T {
    const transaction = this.db.transaction(fn);
    return transaction();
  }

  close(): void {
    this.db.close();
  }

  // ====================
  // Session Operations
  // ====================

  /**
   * Insert or replace a session and its tool counts
   */
  saveSession(session: Session): void {
    try {
      this.transaction(() => {
        this.db.prepare(`
          INSERT INTO sessions (
            session_id, project_path, started_at, ended_at,
            duration_seconds, turn_count, tool_call_count,
            delegation_count, error_count, model_used, status, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT(session_id) DO UPDATE SET
            project_path = excluded.project_path,
            started_at = excluded.started_at,
            ended_at = excluded.ended_at,
            duration_seconds = excluded.duration_seconds,
            turn_count = excluded.turn_count,
            tool_call_count = excluded.tool_call_count,
            delegation_count = excluded.delegation_count,
            error_count = excluded.error_count,
            model_used = excluded.model_used,
            status = excluded.status,
            created_at = excluded.created_at
        `).run(
          session.session_id,
          session.project_path,
          session.started_at,
          session.ended_at,
          session.duration_seconds,
          session.turn_count,
          session.tool_call_count,
          session.delegation_count,
          session.error_count,
          session.model_used,
          session.status,
          Date.now()
        );

        this.db.prepare('DELETE FROM session_tools WHERE session_id = ?').run(session.session_id);

        const toolStmt = this.db.prepare(`
          INSERT INTO session_tools (session_id, tool_name, call_count)
          VALUES (?, ?, ?)
        `);
        for (const [toolName, count] of Object.entries(session.tool_counts)) {
          toolStmt.run(session.session_id, toolName, count);
        }
      });
    } catch (error) {
      throw new DatabaseError('Failed to save session', {
        session_id: session.session_id,
        error: errorMessage(error),
      });
    }
  }

  getSession(sessionId: string): Session | null {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT * FROM sessions WHERE session_id = ?')
      .get(sessionId);
    if (!row) return null;

    const tools = this.db
      .prepare<[string], SessionToolRow>('SELECT * FROM session_tools WHERE session_id = ? ORDER BY rowid')
      .all(sessionId);

    return this.toSession(row, tools);
  }

  getAllSessions(): Session[] {
    const rows = this.db
      .prepare<[], SessionRow>('SELECT * FROM sessions ORDER BY started_at')
      .all();
    const tools = this.db
      .prepare<[], SessionToolRow>('SELECT * FROM session_tools ORDER BY rowid')
      .all();
    return this.attachTools(rows, tools);
  }

  /**
   * Sessions whose start falls in [start, end), oldest first
   */
  getSessionsInRange(start: number, end: number): Session[] {
    const rows = this.db
      .prepare<[number, number], SessionRow>(`
        SELECT * FROM sessions
        WHERE started_at >= ? AND started_at < ?
        ORDER BY started_at
      `)
      .all(start, end);

    const tools = this.db
      .prepare<[number, number], SessionToolRow>(`
        SELECT st.session_id, st.tool_name, st.call_count
        FROM session_tools st
        JOIN sessions s ON s.session_id = st.session_id
        WHERE s.started_at >= ? AND s.started_at < ?
        ORDER BY st.rowid
      `)
      .all(start, end);

    return this.attachTools(rows, tools);
  }

  sessionExists(sessionId: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>('SELECT 1 AS found FROM sessions WHERE session_id = ? LIMIT 1')
      .get(sessionId);
    return row !== undefined;
  }

  getSessionCount(): number {
    const row = this.db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM sessions').get();
    return row?.count ?? 0;
  }

  /**
   * Earliest and latest session start, or null when empty
   */
  getSessionDateRange(): SessionDateRange | null {
    const row = this.db
      .prepare<[], DateRangeRow>('SELECT MIN(started_at) AS first, MAX(started_at) AS last FROM sessions')
      .get();
    if (!row || row.first === null || row.last === null) return null;
    return { first: row.first, last: row.last };
  }

  /**
   * Tool call totals across all sessions, busiest first
   */
  getToolUsageSummary(): ToolUsageEntry[] {
    return this.db
      .prepare<[], ToolUsageEntry>(`
        SELECT tool_name, SUM(call_count) AS call_count
        FROM session_tools
        GROUP BY tool_name
        ORDER BY call_count DESC, tool_name ASC
      `)
      .all();
  }

  private toSession(row: SessionRow, tools: SessionToolRow[]): Session {
    const toolCounts: Record<string, number> = Object.fromEntries(
      tools.map((tool): [string, number] => [tool.tool_name, tool.call_count])
    );

    return {
      session_id: row.session_id,
      project_path: row.project_path,
      started_at: row.started_at,
      ended_at: row.ended_at,
      duration_seconds: row.duration_seconds,
      turn_count: row.turn_count,
      tool_call_count: row.tool_call_count,
      delegation_count: row.delegation_count,
      error_count: row.error_count,
      tool_counts: toolCounts,
      model_used: row.model_used ?? 'unknown',
      status: row.status,
    };
  }

  private attachTools(rows: SessionRow[], tools: SessionToolRow[]): Session[] {
    const toolsBySession = new Map<string, SessionToolRow[]>();
    for (const tool of tools) {
      const list = toolsBySession.get(tool.session_id) ?? [];
      list.push(tool);
      toolsBySession.set(tool.session_id, list);
    }
    return rows.map((row) => this.toSession(row, toolsBySession.get(row.session_id) ?? []));
  }

  // ====================
  // Weekly Metrics Operations
  // ====================

  /**
   * Rollup for (userId, weekStart), or null if that week was never computed.
   * Derived fields are rebuilt from the stored sums.
   */
  getWeeklyMetrics(weekStart: number, userId: string = LOCAL_USER_ID): WeeklyMetrics | null {
    const row = this.db
      .prepare<[string, number], WeeklyMetricsRow>(`
        SELECT * FROM weekly_metrics
        WHERE user_id = ? AND week_start = ?
      `)
      .get(userId, weekStart);
    if (!row) return null;

    return deriveWeeklyMetrics(
      {
        user_id: row.user_id,
        week_start: row.week_start,
        session_count: row.session_count,
        total_duration_seconds: row.total_duration_seconds,
        total_turns: row.total_turns,
        total_tool_calls: row.total_tool_calls,
        total_delegations: row.total_delegations,
        total_errors: row.total_errors,
        tool_counts: parseToolCounts(row.tool_counts),
      },
      {
        sessions_change_pct: row.sessions_change_pct,
        tools_change_pct: row.tools_change_pct,
        delegation_change_pct: row.delegation_change_pct,
        error_change_pct: row.error_change_pct,
      }
    );
  }

  /**
   * Save or overwrite the rollup for (user_id, week_start)
   */
  saveWeeklyMetrics(metrics: WeeklyMetrics): void {
    try {
      this.db.prepare(`
        INSERT OR REPLACE INTO weekly_metrics (
          user_id, week_start, session_count, total_duration_seconds,
          total_turns, total_tool_calls, total_delegations, total_errors,
          unique_tools, tool_counts, top_5_tools, avg_session_duration,
          avg_turns_per_session, delegation_ratio, error_rate,
          sessions_change_pct, tools_change_pct, delegation_change_pct,
          error_change_pct, computed_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        metrics.user_id,
        metrics.week_start,
        metrics.session_count,
        metrics.total_duration_seconds,
        metrics.total_turns,
        metrics.total_tool_calls,
        metrics.total_delegations,
        metrics.total_errors,
        metrics.unique_tools,
        JSON.stringify(metrics.tool_counts),
        JSON.stringify(metrics.top_5_tools),
        metrics.avg_session_duration,
        metrics.avg_turns_per_session,
        metrics.delegation_ratio,
        metrics.error_rate,
        metrics.sessions_change_pct,
        metrics.tools_change_pct,
        metrics.delegation_change_pct,
        metrics.error_change_pct,
        Date.now()
      );
    } catch (error) {
      throw new DatabaseError('Failed to save weekly metrics', {
        user_id: metrics.user_id,
        week_start: metrics.week_start,
        error: errorMessage(error),
      });
    }
  }
}
