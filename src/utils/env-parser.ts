/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access and provides clear error messages
 * for misconfiguration. `.env` files are loaded by the CLI through dotenv
 * before any of these run.
 */

import {
  logConfigSchema,
  recorderConfigSchema,
  sessionConfigSchema,
  toolServerConfigSchema,
  ConfigValidationError,
  type LogConfig,
  type RecorderConfig,
  type SessionConfig,
  type ToolServerConfig,
} from './config-schemas.js';

type Env = Record<string, string | undefined>;

/**
 * Unset and empty variables both mean "use the default".
 */
function read(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: read(env, 'LOG_LEVEL'),
    prettyPrint: read(env, 'LOG_PRETTY'),
  };
}

function mapEnvToRecorderConfig(env: Env) {
  return {
    targetUrl: read(env, 'TARGET_URL'),
    loginUrl: read(env, 'LOGIN_URL'),
    sessionFile: read(env, 'SESSION_FILE'),
    eventsLog: read(env, 'EVENTS_LOG'),
    headless: read(env, 'HEADLESS'),
    maxLoginSteps: read(env, 'MAX_LOGIN_STEPS'),
    exploreClicks: read(env, 'EXPLORE_CLICKS'),
    enrichConcurrency: read(env, 'ENRICH_CONCURRENCY'),
    captureDenylist: read(env, 'CAPTURE_DENYLIST'),
  };
}

function mapEnvToToolServerConfig(env: Env) {
  return {
    toolsModule: read(env, 'TOOLS_MODULE'),
    sessionFile: read(env, 'SESSION_FILE'),
  };
}

function mapEnvToSessionConfig(env: Env) {
  return {
    sessionFile: read(env, 'SESSION_FILE'),
  };
}

// ============================================
// INDIVIDUAL CONFIG PARSERS
// ============================================

/**
 * Parse and validate logging configuration from environment.
 */
export function parseLogConfig(env: Env = process.env): LogConfig {
  const result = logConfigSchema.safeParse(mapEnvToLogConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('logging', result.error);
  }
  return result.data;
}

/**
 * Parse and validate recorder configuration from environment.
 * `overrides` come from CLI flags and win over the environment.
 */
export function parseRecorderConfig(
  env: Env = process.env,
  overrides: Partial<Record<keyof RecorderConfig, string>> = {}
): RecorderConfig {
  const mapped = { ...mapEnvToRecorderConfig(env) };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && key in mapped) {
      Object.assign(mapped, { [key]: value });
    }
  }

  const result = recorderConfigSchema.safeParse(mapped);
  if (!result.success) {
    throw new ConfigValidationError('recorder', result.error);
  }
  return result.data;
}

/**
 * Parse and validate tool server configuration from environment.
 */
export function parseToolServerConfig(env: Env = process.env): ToolServerConfig {
  const result = toolServerConfigSchema.safeParse(mapEnvToToolServerConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('toolServer', result.error);
  }
  return result.data;
}

/**
 * Parse the session file location for commands that only read the session.
 */
export function parseSessionConfig(
  env: Env = process.env,
  overrides: Partial<Record<keyof SessionConfig, string>> = {}
): SessionConfig {
  const result = sessionConfigSchema.safeParse({
    ...mapEnvToSessionConfig(env),
    ...(overrides.sessionFile !== undefined ? { sessionFile: overrides.sessionFile } : {}),
  });
  if (!result.success) {
    throw new ConfigValidationError('session', result.error);
  }
  return result.data;
}
