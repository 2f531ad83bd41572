import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs, existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import Database from 'better-sqlite3';
import { DatabaseManager } from '../src/database/index.js';
import { WeeklyAggregator } from '../src/metrics/WeeklyAggregator.js';
import { DatabaseError } from '../src/types/index.js';
import { addDays } from '../src/utils/time.js';
import { makeSession, makeTempDir, makeWeek, PREV_WEEK_START, WEEK_START } from './helpers.js';

describe('DatabaseManager', () => {
  let dataDir: string;
  let db: DatabaseManager;

  beforeEach(() => {
    dataDir = join(makeTempDir('insights-db'), 'data');
    db = new DatabaseManager({ dataDir });
  });

  afterEach(async () => {
    db.close();
    await fs.rm(join(dataDir, '..'), { recursive: true, force: true });
  });

  it('creates the data directory and database file', () => {
    expect(db.getPath()).toBe(join(dataDir, 'metrics.db'));
    expect(existsSync(db.getPath())).toBe(true);
  });

  it('wraps open failures in DatabaseError', () => {
    const blocker = join(dataDir, 'not-a-dir');
    writeFileSync(blocker, 'x');
    expect(() => new DatabaseManager({ dataDir: blocker })).toThrow(DatabaseError);
  });

  describe('sessions', () => {
    it('round-trips a session with tool counts in insertion order', () => {
      const session = makeSession({ session_id: 'abc', tool_counts: { read_file: 3, bash: 2, grep: 1 } });
      db.saveSession(session);

      const loaded = db.getSession('abc');
      expect(loaded).toEqual(session);
      expect(Object.keys(loaded?.tool_counts ?? {})).toEqual(['read_file', 'bash', 'grep']);
      expect(db.sessionExists('abc')).toBe(true);
      expect(db.sessionExists('missing')).toBe(false);
      expect(db.getSession('missing')).toBeNull();
    });

    it('reads back tool names that shadow Object.prototype keys', () => {
      const toolCounts = Object.fromEntries(new Map([['constructor', 2], ['__proto__', 1], ['toString', 3]]));
      db.saveSession(makeSession({ session_id: 'odd-tools', tool_counts: toolCounts }));

      const loaded = db.getSession('odd-tools');
      expect(loaded?.tool_call_count).toBe(6);
      expect(Object.entries(loaded?.tool_counts ?? {})).toEqual([['constructor', 2], ['__proto__', 1], ['toString', 3]]);
    });

    it('replaces a session and its tools on re-save', () => {
      db.saveSession(makeSession({ session_id: 'abc', tool_counts: { bash: 4 } }));
      db.saveSession(makeSession({ session_id: 'abc', turn_count: 9, tool_counts: { grep: 1 } }));

      const loaded = db.getSession('abc');
      expect(db.getSessionCount()).toBe(1);
      expect(loaded?.turn_count).toBe(9);
      expect(loaded?.tool_counts).toEqual({ grep: 1 });
    });

    it('selects sessions in a half-open range', () => {
      const weekEnd = addDays(WEEK_START, 7);
      db.saveSession(makeSession({ session_id: 'before', started_at: WEEK_START - 1 }));
      db.saveSession(makeSession({ session_id: 'last', started_at: weekEnd - 1 }));
      db.saveSession(makeSession({ session_id: 'first', started_at: WEEK_START }));
      db.saveSession(makeSession({ session_id: 'after', started_at: weekEnd }));

      const inWeek = db.getSessionsInRange(WEEK_START, weekEnd);
      expect(inWeek.map((s) => s.session_id)).toEqual(['first', 'last']);
      expect(inWeek[0].tool_counts).toEqual({ read_file: 3, bash: 2 });
    });

    it('lists all sessions oldest first and reports the date range', () => {
      expect(db.getSessionDateRange()).toBeNull();

      db.saveSession(makeSession({ session_id: 'b', started_at: WEEK_START + 5000 }));
      db.saveSession(makeSession({ session_id: 'a', started_at: WEEK_START + 1000 }));

      expect(db.getAllSessions().map((s) => s.session_id)).toEqual(['a', 'b']);
      expect(db.getSessionDateRange()).toEqual({ first: WEEK_START + 1000, last: WEEK_START + 5000 });
    });

    it('summarises tool usage by total, then name', () => {
      db.saveSession(makeSession({ session_id: 's1', tool_counts: { bash: 5, grep: 2, edit: 1 } }));
      db.saveSession(makeSession({ session_id: 's2', tool_counts: { grep: 3, read_file: 6 } }));

      expect(db.getToolUsageSummary()).toEqual([
        { tool_name: 'read_file', call_count: 6 },
        { tool_name: 'bash', call_count: 5 },
        { tool_name: 'grep', call_count: 5 },
        { tool_name: 'edit', call_count: 1 },
      ]);
    });
  });

  describe('weekly metrics', () => {
    it('returns null for a week never computed', () => {
      expect(db.getWeeklyMetrics(WEEK_START)).toBeNull();
    });

    it('round-trips a rollup and rebuilds derived fields', () => {
      const week = {
        ...makeWeek({
          session_count: 2,
          total_duration_seconds: 5800,
          total_turns: 8,
          total_tool_calls: 80,
          total_delegations: 1,
          total_errors: 8,
          tool_counts: { read_file: 30, bash: 45, grep: 5 },
        }),
        sessions_change_pct: 100,
        tools_change_pct: null,
        delegation_change_pct: -25,
        error_change_pct: null,
      };
      db.saveWeeklyMetrics(week);

      const loaded = db.getWeeklyMetrics(WEEK_START);
      expect(loaded).toEqual(week);
      expect(loaded?.top_5_tools).toEqual(['bash', 'read_file', 'grep']);
      expect(loaded?.avg_session_duration).toBe(2900);
    });

    it('keys rollups by user', () => {
      db.saveWeeklyMetrics(makeWeek({ session_count: 3 }));
      expect(db.getWeeklyMetrics(WEEK_START, 'someone-else')).toBeNull();
      expect(db.getWeeklyMetrics(WEEK_START, 'local')?.session_count).toBe(3);
    });

    it('overwrites a rollup for the same key', () => {
      db.saveWeeklyMetrics(makeWeek({ session_count: 3 }));
      db.saveWeeklyMetrics(makeWeek({ session_count: 7 }));
      expect(db.getWeeklyMetrics(WEEK_START)?.session_count).toBe(7);
    });

    it('raises DatabaseError on a corrupt tool_counts column', () => {
      db.saveWeeklyMetrics(makeWeek({ session_count: 1 }));

      const raw = new Database(db.getPath());
      raw.prepare("UPDATE weekly_metrics SET tool_counts = '{broken'").run();
      raw.close();

      expect(() => db.getWeeklyMetrics(WEEK_START)).toThrow(DatabaseError);
    });
  });

  describe('WeeklyAggregator', () => {
    it('computes consecutive weeks with growth from the stored predecessor', () => {
      db.saveSession(makeSession({ session_id: 'p1', started_at: PREV_WEEK_START + 3_600_000, tool_counts: { bash: 2 } }));
      db.saveSession(makeSession({ session_id: 'c1', started_at: WEEK_START + 3_600_000, tool_counts: { bash: 1, grep: 1 } }));
      db.saveSession(makeSession({ session_id: 'c2', started_at: WEEK_START + 7_200_000, tool_counts: { edit: 4 } }));

      const aggregator = new WeeklyAggregator(db);
      const now = WEEK_START + 86_400_000;

      expect(aggregator.recomputeRecentWeeks(now, 2)).toEqual([PREV_WEEK_START, WEEK_START]);

      const previous = db.getWeeklyMetrics(PREV_WEEK_START);
      const current = db.getWeeklyMetrics(WEEK_START);

      expect(previous?.session_count).toBe(1);
      expect(current?.session_count).toBe(2);
      expect(current?.tool_counts).toEqual({ bash: 1, grep: 1, edit: 4 });
      expect(current?.sessions_change_pct).toBe(100);
      expect(current?.tools_change_pct).toBe(200);
    });

    it('leaves growth null without a stored previous week', () => {
      db.saveSession(makeSession({ session_id: 'c1', started_at: WEEK_START + 3_600_000 }));

      const week = new WeeklyAggregator(db).calculateWeek(WEEK_START);

      expect(week.session_count).toBe(1);
      expect(week.sessions_change_pct).toBeNull();
      expect(db.getWeeklyMetrics(WEEK_START)).toBeNull();
    });
  });
});
