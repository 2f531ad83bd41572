// Public library surface

export { InsightsEngine } from './InsightsEngine.js';
export type { InsightsEngineOptions, RefreshOptions } from './InsightsEngine.js';
export {
  formatConversationalResponse,
  formatGrowthResponse,
  formatPercentChange,
  formatToolUsageResponse,
} from './formatters.js';
export { classifyQuery, getPersonalInsights, runInsightsQuery, NO_DATA_RESPONSE } from './personal.js';
export type { InsightsQueryKind, PersonalInsightsOptions } from './personal.js';

export { DatabaseManager } from '../database/index.js';
export { SessionParser } from '../parser/SessionParser.js';
export { WeeklyAggregator, aggregateSessions } from '../metrics/WeeklyAggregator.js';
export { calculateGrowth, percentChange } from '../metrics/growth.js';
export { evaluateTips } from '../tips/TipEngine.js';
export { TIP_RULES } from '../tips/rules.js';
export { resolveConfig } from '../utils/config.js';
export * from '../types/index.js';
