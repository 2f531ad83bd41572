/**
 * Personal insights entry point
 * Routes a free-form question to the matching engine query and formats the answer.
 */

import { existsSync } from 'fs';
import { basename, dirname } from 'path';
import { DatabaseManager } from '../database/index.js';
import type { PersonalInsightsResult, TimeRange } from '../types/index.js';
import { DEFAULT_INSIGHTS_QUERY, LOCAL_USER_ID, PACKAGE_NAME } from '../utils/constants.js';
import { InsightsEngine } from './InsightsEngine.js';
import {
  formatConversationalResponse,
  formatGrowthResponse,
  formatToolUsageResponse,
} from './formatters.js';

export type InsightsQueryKind = 'tool_usage' | 'growth' | 'weekly_summary';

export interface PersonalInsightsOptions {
  dbPath: string;
  userId?: string;
  clock?: () => number;
}

export const NO_DATA_RESPONSE =
  `No insights data found. Run \`${PACKAGE_NAME} init\` and \`${PACKAGE_NAME} refresh\` first.`;

/**
 * Keyword routing: tool questions need "what"/"which" too, otherwise
 * growth words win, and everything else is the weekly summary.
 */
export function classifyQuery(query: string): InsightsQueryKind {
  const q = query.toLowerCase();

  if (q.includes('tool') && (q.includes('what') || q.includes('which'))) {
    return 'tool_usage';
  }
  if (q.includes('grow') || q.includes('improv') || q.includes('progress')) {
    return 'growth';
  }
  return 'weekly_summary';
}

/**
 * Run one query kind against an open engine. `timeRange` applies to the weekly summary.
 */
export function runInsightsQuery(
  engine: InsightsEngine,
  kind: InsightsQueryKind,
  timeRange: TimeRange = 'this_week'
): PersonalInsightsResult {
  switch (kind) {
    case 'tool_usage': {
      const data = engine.queryToolUsage();
      return { response: formatToolUsageResponse(data), data };
    }
    case 'growth': {
      const data = engine.queryGrowth();
      return { response: formatGrowthResponse(data), data };
    }
    case 'weekly_summary': {
      const data = engine.queryWeeklySummary(timeRange);
      return { response: formatConversationalResponse(data), data };
    }
  }
}

export function getPersonalInsights(
  query: string = DEFAULT_INSIGHTS_QUERY,
  options: PersonalInsightsOptions
): PersonalInsightsResult {
  if (!existsSync(options.dbPath)) {
    return { response: NO_DATA_RESPONSE, data: {} };
  }

  const db = new DatabaseManager({
    dataDir: dirname(options.dbPath),
    filename: basename(options.dbPath),
  });

  try {
    const engine = new InsightsEngine(db, {
      userId: options.userId ?? LOCAL_USER_ID,
      clock: options.clock,
    });
    return runInsightsQuery(engine, classifyQuery(query));
  } finally {
    db.close();
  }
}
