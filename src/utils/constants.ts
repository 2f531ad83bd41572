/**
 * Shared constants for Session Insights
 */

export const PACKAGE_NAME = 'session-insights';
export const PACKAGE_VERSION = '0.5.0';

// Storage defaults
export const DEFAULT_DATA_DIR_NAME = '.session-insights';
export const DEFAULT_DB_FILENAME = 'metrics.db';
export const CONFIG_FILENAME = 'config.json';
export const LOCAL_USER_ID = 'local';

// Aggregation
export const TOP_TOOLS_LIMIT = 5;
export const WEEKS_TO_COMPUTE_DEFAULT = 4;
export const WEEKS_TO_COMPUTE_MAX = 52;

// Tip thresholds
export const DOMINANT_TOOL_NAME = 'bash';
export const DOMINANT_TOOL_SHARE_THRESHOLD = 0.3;
export const LOW_DELEGATION_THRESHOLD = 0.3;
export const HIGH_ERROR_RATE_THRESHOLD = 0.15;
export const LONG_SESSION_MINUTES_THRESHOLD = 60;

// Growth
export const SESSION_GROWTH_THRESHOLD_PCT = 10;
export const AREA_DECLINE_THRESHOLD_PCT = -5;

// Presentation
export const MAX_TIPS_SHOWN = 3;
export const TOOL_USAGE_LIST_LIMIT = 10;

// MCP tool
export const INSIGHTS_TOOL_NAME = 'get_usage_insights';
export const DEFAULT_INSIGHTS_QUERY = 'How am I doing this week?';
export const INSIGHTS_QUERY_MAX_LENGTH = 500;
