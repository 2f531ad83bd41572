// ====================
// Error Types
// ====================

export class InsightsError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'InsightsError';
  }
}

export class ValidationError extends InsightsError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class DatabaseError extends InsightsError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', details);
    this.name = 'DatabaseError';
  }
}

export class SessionParseError extends InsightsError {
  constructor(message: string, details?: unknown) {
    super(message, 'SESSION_PARSE_ERROR', details);
    this.name = 'SessionParseError';
  }
}
