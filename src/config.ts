/**
 * Configuration from environment variables, overridden by CLI flags.
 * Every invalid value is collected and reported in one ConfigError.
 */

import { ConfigError, maskSecret } from './domain/errors';
import { LogLevel, parseLogLevel } from './logger';

export interface ServiceConfig {
  baseUrl: string;
  username?: string;
  password?: string;
  token?: string;
  timeoutMs: number;
  pageSize: number;
}

export interface ReconcilerConfig {
  /** Absent when no server URL is configured. */
  service?: ServiceConfig;
  desiredStatePath?: string;
  reportDir: string;
  logLevel: LogLevel;
  logFile?: string;
  actorId: string;
  port: number;
}

/** Values given on the command line; each wins over its variable. */
export interface ConfigOverrides {
  bambooUrl?: string;
  bambooUser?: string;
  bambooPassword?: string;
  bambooToken?: string;
  desired?: string;
  reportDir?: string;
  logLevel?: string;
  logFile?: string;
  port?: string;
  actor?: string;
}

export const DEFAULTS = {
  timeoutMs: 30_000,
  pageSize: 100,
  reportDir: 'reports',
  logLevel: LogLevel.Info,
  actorId: 'access-reconciler',
  port: 3000,
} as const;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseInteger(
  raw: string | undefined,
  name: string,
  fallback: number,
  min: number,
  max: number,
  problems: string[],
): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    problems.push(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
    return fallback;
  }
  return value;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): ReconcilerConfig {
  const problems: string[] = [];
  const pick = (override: string | undefined, variable: string): string | undefined =>
    nonEmpty(override) ?? nonEmpty(env[variable]);

  const rawLevel = pick(overrides.logLevel, 'RECONCILER_LOG_LEVEL');
  const logLevel = rawLevel === undefined ? DEFAULTS.logLevel : parseLogLevel(rawLevel);
  if (logLevel === undefined) {
    problems.push(`log level must be one of ${Object.values(LogLevel).join(', ')}, got "${rawLevel}"`);
  }

  const port = parseInteger(pick(overrides.port, 'PORT'), 'PORT', DEFAULTS.port, 0, 65535, problems);
  const timeoutMs = parseInteger(
    nonEmpty(env.BAMBOO_TIMEOUT_MS),
    'BAMBOO_TIMEOUT_MS',
    DEFAULTS.timeoutMs,
    1,
    600_000,
    problems,
  );
  const pageSize = parseInteger(nonEmpty(env.BAMBOO_PAGE_SIZE), 'BAMBOO_PAGE_SIZE', DEFAULTS.pageSize, 1, 10_000, problems);

  let service: ServiceConfig | undefined;
  const baseUrl = pick(overrides.bambooUrl, 'BAMBOO_URL');
  const username = pick(overrides.bambooUser, 'BAMBOO_USER');
  const password = pick(overrides.bambooPassword, 'BAMBOO_PASSWORD');
  const token = pick(overrides.bambooToken, 'BAMBOO_TOKEN');
  if (baseUrl !== undefined) {
    let valid = false;
    try {
      const url = new URL(baseUrl);
      valid = url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
      valid = false;
    }
    if (!valid) problems.push(`BAMBOO_URL must be an http(s) URL, got "${baseUrl}"`);
    service = { baseUrl, username, password, token, timeoutMs, pageSize };
  }
  if (password !== undefined && username === undefined) {
    problems.push('BAMBOO_PASSWORD is set without BAMBOO_USER');
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    service,
    desiredStatePath: pick(overrides.desired, 'RECONCILER_DESIRED_STATE'),
    reportDir: pick(overrides.reportDir, 'RECONCILER_REPORT_DIR') ?? DEFAULTS.reportDir,
    logLevel: logLevel ?? DEFAULTS.logLevel,
    logFile: pick(overrides.logFile, 'RECONCILER_LOG_FILE'),
    actorId: pick(overrides.actor, 'RECONCILER_ACTOR') ?? DEFAULTS.actorId,
    port,
  };
}

/** The service settings, or a ConfigError naming what is missing. */
export function requireServiceConfig(config: ReconcilerConfig): ServiceConfig {
  if (!config.service) {
    throw new ConfigError(['BAMBOO_URL (or --bamboo-url) is required']);
  }
  return config.service;
}

/** The desired-state path, or a ConfigError naming what is missing. */
export function requireDesiredStatePath(config: ReconcilerConfig): string {
  if (!config.desiredStatePath) {
    throw new ConfigError(['RECONCILER_DESIRED_STATE (or --desired) is required']);
  }
  return config.desiredStatePath;
}

/** Loggable view of the configuration with credentials masked. */
export function describeConfig(config: ReconcilerConfig): Record<string, unknown> {
  return {
    baseUrl: config.service?.baseUrl,
    username: config.service?.username,
    password: config.service?.password ? maskSecret(config.service.password) : undefined,
    token: config.service?.token ? maskSecret(config.service.token) : undefined,
    desiredStatePath: config.desiredStatePath,
    reportDir: config.reportDir,
    logLevel: config.logLevel,
    logFile: config.logFile,
    actorId: config.actorId,
  };
}
