import { getPersonalInsights } from '../insights/personal.js';
import type { PersonalInsightsOptions } from '../insights/personal.js';
import type { ToolResponse } from '../types/index.js';
import { ValidationError } from '../types/index.js';
import {
  DEFAULT_INSIGHTS_QUERY,
  INSIGHTS_QUERY_MAX_LENGTH,
  INSIGHTS_TOOL_NAME,
} from '../utils/constants.js';
import { validateInsightsQuery } from '../utils/validation.js';

export const tools = [
  {
    name: INSIGHTS_TOOL_NAME,
    description: 'Get personal AI usage insights: weekly summary, tool usage breakdown, growth trends and improvement tips. Ask in plain language, e.g. "How am I doing this week?", "What tools do I use most?", "Am I improving?". Data comes from the local session-insights database; run `session-insights refresh` to update it.',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          maxLength: INSIGHTS_QUERY_MAX_LENGTH,
          description: `Natural language question about your usage (default: "${DEFAULT_INSIGHTS_QUERY}")`,
        },
      },
    },
  },
] as const;

export type ToolCallResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function error(message: string, err?: unknown): ToolResponse {
  return {
    success: false,
    error: message,
    message: err === undefined ? undefined : err instanceof Error ? err.message : String(err),
  };
}

function textResult(body: unknown, isError = false): ToolCallResult {
  const result: ToolCallResult = {
    content: [{ type: 'text', text: JSON.stringify(body, null, 2) }],
  };
  if (isError) result.isError = true;
  return result;
}

/**
 * Dispatch a tools/call request by name
 */
export function handleToolCall(
  name: string,
  args: unknown,
  options: PersonalInsightsOptions
): ToolCallResult {
  switch (name) {
    case INSIGHTS_TOOL_NAME: {
      let query: string;
      try {
        query = validateInsightsQuery(args).query;
      } catch (err) {
        if (err instanceof ValidationError) {
          return textResult(error('Invalid arguments', err), true);
        }
        throw err;
      }

      try {
        return textResult(getPersonalInsights(query, options));
      } catch (err) {
        return textResult(error('Tool execution failed', err), true);
      }
    }
    default:
      return textResult(error(`Unknown tool: ${name}`), true);
  }
}
