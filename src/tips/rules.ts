/**
 * Tip rules, evaluated in declaration order.
 * Each rule guards its own divide-by-zero cases and returns null when it does not fire.
 */

import type { TipRule } from '../types/index.js';
import {
  DOMINANT_TOOL_NAME,
  DOMINANT_TOOL_SHARE_THRESHOLD,
  HIGH_ERROR_RATE_THRESHOLD,
  LONG_SESSION_MINUTES_THRESHOLD,
  LOW_DELEGATION_THRESHOLD,
} from '../utils/constants.js';

function asPercent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

export const highBashUsage: TipRule = {
  id: 'high_bash_usage',
  category: 'tool_usage',
  priority: 'medium',
  evaluate(current) {
    if (current.total_tool_calls === 0) return null;

    const bashCount = current.tool_counts[DOMINANT_TOOL_NAME] ?? 0;
    const share = bashCount / current.total_tool_calls;
    if (share <= DOMINANT_TOOL_SHARE_THRESHOLD) return null;

    return {
      observation: `You use ${DOMINANT_TOOL_NAME} ${asPercent(share)} of the time (${bashCount} calls this week)`,
      recommendation: 'Try using grep for searching files and glob for finding files instead of bash commands',
      expected_benefit: '30% faster file operations with specialized tools',
    };
  },
};

// delegation_ratio is delegations per session, yet the threshold reads as a
// fraction. Kept literal; see DESIGN.md.
export const lowDelegation: TipRule = {
  id: 'low_delegation',
  category: 'delegation',
  priority: 'high',
  evaluate(current) {
    if (current.session_count === 0) return null;
    if (current.delegation_ratio >= LOW_DELEGATION_THRESHOLD) return null;

    return {
      observation: `Your delegation ratio is ${asPercent(current.delegation_ratio)} (${current.total_delegations} delegations in ${current.session_count} sessions)`,
      recommendation: 'Break down complex problems into smaller tasks and delegate to specialized agents',
      expected_benefit: 'Better results through specialized expertise and reduced cognitive load',
    };
  },
};

export const highErrorRate: TipRule = {
  id: 'high_error_rate',
  category: 'error_handling',
  priority: 'high',
  evaluate(current) {
    if (current.total_tool_calls === 0) return null;
    if (current.error_rate <= HIGH_ERROR_RATE_THRESHOLD) return null;

    return {
      observation: `Your error rate is ${asPercent(current.error_rate)} (${current.total_errors} errors in ${current.total_tool_calls} tool calls)`,
      recommendation: 'When you hit errors, try asking for alternative approaches instead of retrying the same path',
      expected_benefit: 'Faster problem resolution and less frustration',
    };
  },
};

export const decliningToolDiversity: TipRule = {
  id: 'declining_tool_diversity',
  category: 'tool_usage',
  priority: 'medium',
  evaluate(current, previous) {
    if (previous === null || current.session_count === 0) return null;
    if (current.unique_tools >= previous.unique_tools) return null;

    const decline = previous.unique_tools - current.unique_tools;
    return {
      observation: `You're using ${decline} fewer tools this week (${current.unique_tools} vs ${previous.unique_tools} last week)`,
      recommendation: "Explore the full toolkit - try using tools you haven't used recently",
      expected_benefit: 'Increased effectiveness by choosing the right tool for each task',
    };
  },
};

export const longSessions: TipRule = {
  id: 'long_sessions',
  category: 'task_management',
  priority: 'medium',
  evaluate(current) {
    if (current.session_count === 0) return null;

    const avgMinutes = current.avg_session_duration / 60;
    if (avgMinutes <= LONG_SESSION_MINUTES_THRESHOLD) return null;

    return {
      observation: `Your average session is ${Math.round(avgMinutes)} minutes (${current.session_count} sessions this week)`,
      recommendation: 'Break work into smaller, focused tasks for better concentration and faster iterations',
      expected_benefit: 'Better focus and more frequent completion milestones',
    };
  },
};

export const TIP_RULES: readonly TipRule[] = [
  highBashUsage,
  lowDelegation,
  highErrorRate,
  decliningToolDiversity,
  longSessions,
];
