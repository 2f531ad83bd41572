// ====================
// Store Contract
// ====================

import type { Session } from './session.js';
import type { WeeklyMetrics } from './metrics.js';

/**
 * What the aggregator needs from persistence: a half-open range query on
 * session start time, and keyed get/put for weekly rollups.
 */
export interface MetricsStore {
  getSessionsInRange(start: number, end: number): Session[];
  getWeeklyMetrics(weekStart: number, userId?: string): WeeklyMetrics | null;
  saveWeeklyMetrics(metrics: WeeklyMetrics): void;
}
