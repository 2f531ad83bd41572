// ====================
// Config Types
// ====================

/**
 * Contents of <dataDir>/config.json. Every key is optional.
 */
export interface InsightsFileConfig {
  projectsDir?: string;
  weeksToCompute?: number;
  userId?: string;
}

/**
 * Values given on the command line; these win over env and config file.
 */
export interface ConfigOverrides {
  dataDir?: string;
  projectsDir?: string;
  weeksToCompute?: number;
}

export interface ResolvedConfig {
  dataDir: string;
  dbFilename: string;
  dbPath: string;
  projectsDir: string;
  weeksToCompute: number;
  userId: string;
}
