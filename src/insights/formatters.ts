/**
 * Conversational formatting for insights query results
 */

import type { GrowthReport, InsightsSummary, ToolUsageReport } from '../types/index.js';
import { MAX_TIPS_SHOWN, TOOL_USAGE_LIST_LIMIT } from '../utils/constants.js';

/**
 * Signed whole percent, e.g. "+50%" or "-12%"; null becomes "N/A"
 */
export function formatPercentChange(value: number | null): string {
  if (value === null) return 'N/A';
  const rounded = Math.round(value);
  return rounded >= 0 ? `+${Math.abs(rounded)}%` : `${rounded}%`;
}

function asWholePercent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export function formatConversationalResponse(data: InsightsSummary): string {
  const lines: string[] = [];
  const { trend } = data.growth;

  if (trend === 'improving') {
    lines.push("You're showing strong growth! 🚀\n");
  } else if (trend === 'declining') {
    lines.push("Let's look at your week and find opportunities to improve.\n");
  } else {
    lines.push("Here's your weekly summary:\n");
  }

  const { sessions, tools, effectiveness } = data.metrics;
  lines.push('This Week vs Last Week:');
  lines.push(`• ${sessions.count} sessions (${sessions.change})`);
  lines.push(`• ${tools.unique} different tools used`);
  lines.push(`• Delegation ratio: ${asWholePercent(effectiveness.delegation_ratio)}`);
  lines.push(`• Error rate: ${asWholePercent(effectiveness.error_rate)}`);
  lines.push(`• Avg session duration: ${effectiveness.avg_duration}`);
  lines.push('');

  if (tools.top_5.length > 0) {
    lines.push('Top Tools This Week:');
    tools.top_5.forEach((toolName, i) => lines.push(`${i + 1}. ${toolName}`));
    lines.push('');
  }

  if (data.tips.length > 0) {
    lines.push(`💡 ${data.tips.length} Tips for Improvement:`);
    for (const tip of data.tips.slice(0, MAX_TIPS_SHOWN)) {
      lines.push(`\n[${tip.priority.toUpperCase()}] ${tip.category}`);
      lines.push(`📊 ${tip.observation}`);
      lines.push(`💡 ${tip.recommendation}`);
      lines.push(`✨ ${tip.expected_benefit}`);
    }
    lines.push('');
  }

  if (trend !== 'stable') {
    lines.push(`Overall trend: ${capitalize(trend)} ${trend === 'improving' ? '📈' : '📉'}`);
  }

  return lines.join('\n');
}

export function formatToolUsageResponse(data: ToolUsageReport): string {
  const lines: string[] = [];
  lines.push('📊 Your Tool Usage:\n');
  lines.push(`Total tool calls: ${data.total_calls}`);
  lines.push(`Unique tools: ${data.unique_tools}\n`);

  lines.push('Top Tools:');
  data.top_tools.slice(0, TOOL_USAGE_LIST_LIMIT).forEach(([toolName, count], i) => {
    const share = data.total_calls > 0 ? count / data.total_calls : 0;
    lines.push(`${i + 1}. ${toolName}: ${count} calls (${asWholePercent(share)})`);
  });

  return lines.join('\n');
}

export function formatGrowthResponse(data: GrowthReport): string {
  const lines: string[] = [];
  lines.push('📈 Your Growth This Week:\n');
  lines.push(`Sessions: ${data.current_week_sessions} (was ${data.previous_week_sessions} last week)`);
  lines.push(`Session growth: ${data.sessions_change}`);
  lines.push(`Delegation growth: ${data.delegation_change}`);
  lines.push(`Tool diversity growth: ${data.tools_change}`);
  lines.push(`Error rate change: ${data.error_change}`);
  lines.push(`\nOverall trend: ${capitalize(data.trend)}`);

  return lines.join('\n');
}
