// ====================
// Tip Types
// ====================

import type { WeeklyMetrics } from './metrics.js';

export type TipPriority = 'high' | 'medium' | 'low';
export type TipCategory = 'tool_usage' | 'delegation' | 'error_handling' | 'task_management';

export interface RuleTip {
  rule_id: string;
  category: TipCategory;
  priority: TipPriority;

  observation: string;
  recommendation: string;
  expected_benefit: string;

  generated_at: number;         // Unix ms
  based_on_week: number;        // week_start of the metrics evaluated
}

export type TipContent = Pick<RuleTip, 'observation' | 'recommendation' | 'expected_benefit'>;

/**
 * A single threshold rule. Pure: reads metrics, returns content or null.
 */
export interface TipRule {
  id: string;
  category: TipCategory;
  priority: TipPriority;
  evaluate(current: WeeklyMetrics, previous: WeeklyMetrics | null): TipContent | null;
}
