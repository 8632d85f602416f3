import { ENV_PREFIX } from './constants';
import { getLogger } from './logger';

const log = getLogger('config');

/**
 * Settings for the command-line interface.
 * Command options override these per invocation.
 */
export interface CliConfig {
  /** Write the `# Databricks notebook source` header when rendering source */
  readonly includeHeader: boolean;
  /** Indentation of JSON output */
  readonly jsonIndent: number;
}

export const DEFAULT_CONFIG: CliConfig = Object.freeze({
  includeHeader: true,
  jsonIndent: 2,
});

const MAX_JSON_INDENT = 8;

type Env = Record<string, string | undefined>;

function getBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const raw = env[ENV_PREFIX + key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return defaultValue;
  }
  if (['1', 'true', 'yes', 'on'].includes(raw)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(raw)) {
    return false;
  }
  log.info('ignoring %s%s=%o: expected a boolean', ENV_PREFIX, key, raw);
  return defaultValue;
}

function getIndent(env: Env, key: string, defaultValue: number): number {
  const raw = env[ENV_PREFIX + key]?.trim();
  if (raw === undefined || raw === '') {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > MAX_JSON_INDENT) {
    log.info('ignoring %s%s=%o: expected an integer 0-%d', ENV_PREFIX, key, raw, MAX_JSON_INDENT);
    return defaultValue;
  }
  return value;
}

/**
 * Read CLI settings from NBSOURCE_* environment variables
 */
export function loadConfig(env: Env = process.env): CliConfig {
  return Object.freeze({
    includeHeader: getBoolean(env, 'HEADER', DEFAULT_CONFIG.includeHeader),
    jsonIndent: getIndent(env, 'JSON_INDENT', DEFAULT_CONFIG.jsonIndent),
  });
}
