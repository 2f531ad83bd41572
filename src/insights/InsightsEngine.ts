/**
 * Insights Engine
 * Query interface over stored sessions and weekly rollups
 */

import type { DatabaseManager } from '../database/index.js';
import type { SessionParser } from '../parser/SessionParser.js';
import type {
  GrowthArea,
  GrowthReport,
  InsightsSummary,
  RefreshResult,
  TimeRange,
  ToolUsageReport,
  WeeklyMetrics,
} from '../types/index.js';
import { calculateGrowth } from '../metrics/growth.js';
import { WeeklyAggregator } from '../metrics/WeeklyAggregator.js';
import { evaluateTips } from '../tips/TipEngine.js';
import {
  AREA_DECLINE_THRESHOLD_PCT,
  LOCAL_USER_ID,
  WEEKS_TO_COMPUTE_DEFAULT,
} from '../utils/constants.js';
import { addWeeks, formatHoursMinutes, getWeekStart, previousWeekStart } from '../utils/time.js';
import { formatPercentChange } from './formatters.js';

export interface InsightsEngineOptions {
  userId?: string;
  clock?: () => number;
}

export interface RefreshOptions {
  weeks?: number;
  onProgress?: (processed: number, total: number) => void;
}

export class InsightsEngine {
  private aggregator: WeeklyAggregator;
  private userId: string;
  private clock: () => number;

  constructor(private db: DatabaseManager, options: InsightsEngineOptions = {}) {
    this.userId = options.userId ?? LOCAL_USER_ID;
    this.clock = options.clock ?? Date.now;
    this.aggregator = new WeeklyAggregator(db, { userId: this.userId });
  }

  /**
   * Stored rollup for the week, computing and saving it on first use
   */
  private getOrComputeWeek(weekStart: number): WeeklyMetrics {
    return this.db.getWeeklyMetrics(weekStart, this.userId) ?? this.aggregator.computeAndSave(weekStart);
  }

  private resolveWeekStart(timeRange: TimeRange): number {
    const thisWeek = getWeekStart(this.clock());
    return timeRange === 'last_week' ? addWeeks(thisWeek, -1) : thisWeek;
  }

  queryWeeklySummary(timeRange: TimeRange = 'this_week'): InsightsSummary {
    const weekStart = this.resolveWeekStart(timeRange);
    const current = this.getOrComputeWeek(weekStart);
    const previous = this.db.getWeeklyMetrics(previousWeekStart(weekStart), this.userId);

    const tips = evaluateTips(current, previous, this.clock());
    const { trend } = calculateGrowth(current, previous);

    const summaryParts = [`${current.session_count} sessions this week`];
    const change = current.sessions_change_pct;
    if (change !== null) {
      if (change > 0) {
        summaryParts.push(`up ${Math.round(change)}% from last week`);
      } else if (change < 0) {
        summaryParts.push(`down ${Math.round(Math.abs(change))}% from last week`);
      } else {
        summaryParts.push('same as last week');
      }
    }

    let strongestArea: GrowthArea | 'unknown' = 'unknown';
    const areasToImprove: GrowthArea[] = [];

    if (previous !== null) {
      // Fewer errors is better, so the error change counts negated
      const growthScores: Array<[GrowthArea, number]> = [
        ['delegation', current.delegation_change_pct ?? 0],
        ['tool_diversity', current.tools_change_pct ?? 0],
        ['error_handling', -(current.error_change_pct ?? 0)],
      ];

      let best = growthScores[0];
      for (const entry of growthScores) {
        if (entry[1] > best[1]) best = entry;
        if (entry[1] < AREA_DECLINE_THRESHOLD_PCT) areasToImprove.push(entry[0]);
      }
      strongestArea = best[0];
    }

    return {
      summary: summaryParts.join(', '),
      metrics: {
        sessions: {
          count: current.session_count,
          change: formatPercentChange(current.sessions_change_pct),
          total_duration: formatHoursMinutes(current.total_duration_seconds),
        },
        tools: {
          unique: current.unique_tools,
          top_5: current.top_5_tools,
          total_calls: current.total_tool_calls,
        },
        effectiveness: {
          avg_duration: `${Math.round(current.avg_session_duration / 60)}min`,
          delegation_ratio: current.delegation_ratio,
          error_rate: current.error_rate,
        },
      },
      growth: {
        trend,
        strongest_area: strongestArea,
        areas_to_improve: areasToImprove,
      },
      tips,
    };
  }

  /**
   * Tool usage across every stored session
   */
  queryToolUsage(): ToolUsageReport {
    const usage = this.db.getToolUsageSummary();
    return {
      total_calls: usage.reduce((sum, entry) => sum + entry.call_count, 0),
      unique_tools: usage.length,
      top_tools: usage.map((entry): [string, number] => [entry.tool_name, entry.call_count]),
    };
  }

  queryGrowth(): GrowthReport {
    const weekStart = getWeekStart(this.clock());
    const current = this.getOrComputeWeek(weekStart);
    const previous = this.db.getWeeklyMetrics(previousWeekStart(weekStart), this.userId);
    const { trend } = calculateGrowth(current, previous);

    return {
      current_week_sessions: current.session_count,
      previous_week_sessions: previous?.session_count ?? 0,
      sessions_change: formatPercentChange(current.sessions_change_pct),
      delegation_change: formatPercentChange(current.delegation_change_pct),
      tools_change: formatPercentChange(current.tools_change_pct),
      error_change: formatPercentChange(current.error_change_pct),
      trend,
    };
  }

  /**
   * Parse and store every session under `projectsDir`, then recompute recent weeks.
   * A session that fails to parse is recorded and skipped.
   */
  refresh(parser: SessionParser, projectsDir: string, options: RefreshOptions = {}): RefreshResult {
    const sessionDirs = parser.findSessions(projectsDir);
    const result: RefreshResult = {
      found: sessionDirs.length,
      processed: 0,
      failures: [],
      weeks_computed: [],
    };

    for (const sessionDir of sessionDirs) {
      try {
        this.db.saveSession(parser.parseSession(sessionDir));
        result.processed += 1;
      } catch (err) {
        result.failures.push({
          session_dir: sessionDir,
          error: err instanceof Error ? err.message : String(err),
        });
      }
      options.onProgress?.(result.processed + result.failures.length, sessionDirs.length);
    }

    if (result.found > 0) {
      result.weeks_computed = this.aggregator.recomputeRecentWeeks(
        this.clock(),
        options.weeks ?? WEEKS_TO_COMPUTE_DEFAULT
      );
    }

    return result;
  }
}
