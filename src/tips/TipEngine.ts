/**
 * Tip Engine
 * Runs the rule table against a week's metrics and orders the results by priority.
 */

import type { RuleTip, TipPriority, TipRule, WeeklyMetrics } from '../types/index.js';
import { TIP_RULES } from './rules.js';

const PRIORITY_ORDER: Record<TipPriority, number> = {
  high: 0,
  medium: 1,
  low: 2,
};

/**
 * Evaluate every rule; fired rules become tips stamped with `now`.
 * The sort is stable, so equal priorities keep rule order.
 */
export function evaluateTips(
  current: WeeklyMetrics,
  previous: WeeklyMetrics | null,
  now: number = Date.now(),
  rules: readonly TipRule[] = TIP_RULES
): RuleTip[] {
  const tips: RuleTip[] = [];

  for (const rule of rules) {
    const content = rule.evaluate(current, previous);
    if (content === null) continue;

    tips.push({
      rule_id: rule.id,
      category: rule.category,
      priority: rule.priority,
      ...content,
      generated_at: now,
      based_on_week: current.week_start,
    });
  }

  return tips.sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);
}
