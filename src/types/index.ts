// Session Insights Core Types
// Simple, focused types matching our database schema

export * from './session.js';
export * from './metrics.js';
export * from './tips.js';
export * from './insights.js';
export * from './database.js';
export * from './store.js';
export * from './config.js';
export * from './errors.js';

// ========================
// Tool Response Types
// ========================

export interface ToolResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}
