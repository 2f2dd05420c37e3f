/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the application requires.
 *
 * @see .env.example for the supported environment variables
 */

import 'dotenv/config';

// ---------------------------------------------------------------------------
// Config helpers
// ---------------------------------------------------------------------------

/** Read an env var that may be absent. Absence is handled by the caller. */
function maybe(key: string): string | undefined {
  const raw = process.env[key];
  return raw && raw.trim() ? raw : undefined;
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

function sessionProvider(): 'memory' | 'sqlite' {
  return optional('SESSION_STORE_PROVIDER', 'memory') === 'sqlite' ? 'sqlite' : 'memory';
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 8000),
  nodeEnv: optional('NODE_ENV', 'development'),

  /**
   * Model credential. Missing is not a startup failure: the assistant answers
   * with a placeholder until a key is configured.
   */
  anthropicApiKey: maybe('ANTHROPIC_API_KEY'),

  /** Language model settings */
  model: {
    id: optional('ANTHROPIC_MODEL', 'claude-sonnet-4-20250514'),
    maxTokens: optionalInt('MODEL_MAX_TOKENS', 800),
    temperature: 0,
  },

  /** Tool orchestration settings */
  orchestrator: {
    maxToolRounds: optionalInt('MAX_TOOL_ROUNDS', 2),
  },

  /** Course index and ingestion */
  courses: {
    sqlitePath: dbPath('COURSE_DB_PATH', '/app/data/courses.db', './data/courses.db'),
    docsPath: optional('DOCS_PATH', './docs'),
    maxResults: optionalInt('MAX_RESULTS', 5),
    chunkSize: optionalInt('CHUNK_SIZE', 800),
    chunkOverlap: optionalInt('CHUNK_OVERLAP', 100),
  },

  /** Session history storage */
  sessions: {
    provider: sessionProvider(),
    sqlitePath: dbPath('SESSION_DB_PATH', '/app/data/sessions.db', './data/sessions.db'),
    maxHistory: optionalInt('MAX_HISTORY', 2),
  },

  /** HTTP request limits */
  api: {
    maxQueryLength: optionalInt('MAX_QUERY_LENGTH', 5000),
  },
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration at startup.
 * Throws if values are invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (Number.isNaN(config.port) || config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (Number.isNaN(config.model.maxTokens) || config.model.maxTokens < 1) {
    errors.push(`MODEL_MAX_TOKENS must be >= 1, got ${config.model.maxTokens}`);
  }
  const rounds = config.orchestrator.maxToolRounds;
  if (Number.isNaN(rounds) || rounds < 1 || rounds > 10) {
    errors.push(`MAX_TOOL_ROUNDS must be 1-10, got ${rounds}`);
  }
  if (Number.isNaN(config.courses.maxResults) || config.courses.maxResults < 1) {
    errors.push(`MAX_RESULTS must be >= 1, got ${config.courses.maxResults}`);
  }
  if (Number.isNaN(config.courses.chunkSize) || config.courses.chunkSize < 1) {
    errors.push(`CHUNK_SIZE must be >= 1, got ${config.courses.chunkSize}`);
  }
  const overlap = config.courses.chunkOverlap;
  if (Number.isNaN(overlap) || overlap < 0 || overlap >= config.courses.chunkSize) {
    errors.push(`CHUNK_OVERLAP must be >= 0 and smaller than CHUNK_SIZE, got ${overlap}`);
  }
  if (Number.isNaN(config.sessions.maxHistory) || config.sessions.maxHistory < 0) {
    errors.push(`MAX_HISTORY must be >= 0, got ${config.sessions.maxHistory}`);
  }
  if (Number.isNaN(config.api.maxQueryLength) || config.api.maxQueryLength < 1) {
    errors.push(`MAX_QUERY_LENGTH must be >= 1, got ${config.api.maxQueryLength}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
