import { describe, it, expect } from 'vitest';
import {
  formatConversationalResponse,
  formatGrowthResponse,
  formatPercentChange,
  formatToolUsageResponse,
} from '../src/insights/formatters.js';
import type { InsightsSummary, RuleTip } from '../src/types/index.js';

function tip(ruleId: string, priority: RuleTip['priority']): RuleTip {
  return {
    rule_id: ruleId,
    category: 'tool_usage',
    priority,
    observation: `observed ${ruleId}`,
    recommendation: `try ${ruleId}`,
    expected_benefit: `benefit ${ruleId}`,
    generated_at: 0,
    based_on_week: 0,
  };
}

const EMPTY_SUMMARY: InsightsSummary = {
  summary: '0 sessions this week',
  metrics: {
    sessions: { count: 0, change: 'N/A', total_duration: '0h 0m' },
    tools: { unique: 0, top_5: [], total_calls: 0 },
    effectiveness: { avg_duration: '0min', delegation_ratio: 0, error_rate: 0 },
  },
  growth: { trend: 'stable', strongest_area: 'unknown', areas_to_improve: [] },
  tips: [],
};

describe('formatPercentChange', () => {
  it('formats signed whole percentages', () => {
    expect(formatPercentChange(null)).toBe('N/A');
    expect(formatPercentChange(100)).toBe('+100%');
    expect(formatPercentChange(-12.4)).toBe('-12%');
    expect(formatPercentChange(2.5)).toBe('+3%');
    expect(formatPercentChange(0)).toBe('+0%');
    expect(formatPercentChange(-0.4)).toBe('+0%');
  });
});

describe('formatConversationalResponse', () => {
  it('renders a quiet week', () => {
    expect(formatConversationalResponse(EMPTY_SUMMARY)).toBe(
      "Here's your weekly summary:\n" +
      '\n' +
      'This Week vs Last Week:\n' +
      '• 0 sessions (N/A)\n' +
      '• 0 different tools used\n' +
      '• Delegation ratio: 0%\n' +
      '• Error rate: 0%\n' +
      '• Avg session duration: 0min\n'
    );
  });

  it('renders top tools, at most three tips and the trend', () => {
    const summary: InsightsSummary = {
      ...EMPTY_SUMMARY,
      metrics: {
        sessions: { count: 12, change: '+50%', total_duration: '9h 0m' },
        tools: { unique: 8, top_5: ['bash', 'read_file'], total_calls: 120 },
        effectiveness: { avg_duration: '45min', delegation_ratio: 0.4, error_rate: 0.125 },
      },
      growth: { trend: 'improving', strongest_area: 'delegation', areas_to_improve: [] },
      tips: [tip('a', 'high'), tip('b', 'medium'), tip('c', 'medium'), tip('d', 'low')],
    };

    const lines = formatConversationalResponse(summary).split('\n');

    expect(lines[0]).toBe("You're showing strong growth! 🚀");
    expect(lines).toContain('• 12 sessions (+50%)');
    expect(lines).toContain('• Delegation ratio: 40%');
    expect(lines).toContain('• Error rate: 13%');
    expect(lines).toContain('1. bash');
    expect(lines).toContain('2. read_file');
    expect(lines).toContain('💡 4 Tips for Improvement:');
    expect(lines).toContain('[HIGH] tool_usage');
    expect(lines).toContain('📊 observed c');
    expect(lines).not.toContain('📊 observed d');
    expect(lines[lines.length - 1]).toBe('Overall trend: Improving 📈');
  });

  it('opens differently for a declining week', () => {
    const text = formatConversationalResponse({
      ...EMPTY_SUMMARY,
      growth: { trend: 'declining', strongest_area: 'unknown', areas_to_improve: [] },
    });
    const lines = text.split('\n');

    expect(lines[0]).toBe("Let's look at your week and find opportunities to improve.");
    expect(lines[lines.length - 1]).toBe('Overall trend: Declining 📉');
  });
});

describe('formatToolUsageResponse', () => {
  it('lists tools with their share of calls', () => {
    expect(formatToolUsageResponse({
      total_calls: 80,
      unique_tools: 3,
      top_tools: [['bash', 45], ['read_file', 30], ['grep', 5]],
    })).toBe(
      '📊 Your Tool Usage:\n' +
      '\n' +
      'Total tool calls: 80\n' +
      'Unique tools: 3\n' +
      '\n' +
      'Top Tools:\n' +
      '1. bash: 45 calls (56%)\n' +
      '2. read_file: 30 calls (38%)\n' +
      '3. grep: 5 calls (6%)'
    );
  });

  it('shows at most ten tools', () => {
    const topTools: Array<[string, number]> = Array.from({ length: 12 }, (_, i) => [`tool_${i}`, 1]);
    const lines = formatToolUsageResponse({ total_calls: 12, unique_tools: 12, top_tools: topTools }).split('\n');

    expect(lines[lines.length - 1]).toBe('10. tool_9: 1 calls (8%)');
  });
});

describe('formatGrowthResponse', () => {
  it('renders each change and the trend', () => {
    expect(formatGrowthResponse({
      current_week_sessions: 2,
      previous_week_sessions: 1,
      sessions_change: '+100%',
      delegation_change: '-50%',
      tools_change: '-25%',
      error_change: '+100%',
      trend: 'declining',
    })).toBe(
      '📈 Your Growth This Week:\n' +
      '\n' +
      'Sessions: 2 (was 1 last week)\n' +
      'Session growth: +100%\n' +
      'Delegation growth: -50%\n' +
      'Tool diversity growth: -25%\n' +
      'Error rate change: +100%\n' +
      '\n' +
      'Overall trend: Declining'
    );
  });
});
