/**
 * Connection configuration: defaults, environment overrides and
 * validation. Explicit options win over the environment.
 */

import { DEFAULT_POOL_SIZE } from './constants';
import type { Charset } from './codec/packer';
import type { Mode } from './codec/value';
import { ValidationError } from './errors';

export const DEBUG_LEVELS = ['off', 'low', 'medium', 'high'] as const;

/**
 * Trace verbosity, ordered from silent to most verbose.
 */
export type DebugLevel = (typeof DEBUG_LEVELS)[number];

export const MODES = ['canonical', 'strict'] as const;

const CHARSETS: Record<string, Charset> = {
  'utf-8': 'utf-8',
  utf8: 'utf-8',
  m: 'm',
  binary: 'm',
  ascii: 'm',
};

/**
 * Options accepted by `open()` and `configure()`.
 */
export interface BridgeOptions {
  mode?: Mode;

  /**
   * A level name, its rank (0 to 3) or a boolean (`true` is `low`).
   */
  debug?: DebugLevel | number | boolean;

  charset?: string;

  /**
   * Relink routines on every function or procedure call.
   */
  autoRelink?: boolean;

  /**
   * Worker lanes servicing asynchronous calls.
   */
  poolSize?: number;
}

export interface BridgeConfig {
  mode: Mode;
  debug: DebugLevel;
  charset: Charset;
  autoRelink: boolean;
  poolSize: number;
}

export const DEFAULT_CONFIG: Readonly<BridgeConfig> = {
  mode: 'canonical',
  debug: 'off',
  charset: 'utf-8',
  autoRelink: false,
  poolSize: DEFAULT_POOL_SIZE,
};

/**
 * Position of a level in {@link DEBUG_LEVELS}.
 */
export function debugRank(level: DebugLevel): number {
  return DEBUG_LEVELS.indexOf(level);
}

function parseDebug(value: unknown): DebugLevel {
  if (typeof value === 'boolean') {
    return value ? 'low' : 'off';
  }
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < DEBUG_LEVELS.length) {
    return DEBUG_LEVELS[value];
  }
  const level = DEBUG_LEVELS.find((candidate) => candidate === value);
  if (level === undefined) {
    throw ValidationError.invalidOption('debug', value, DEBUG_LEVELS);
  }
  return level;
}

export function parseMode(value: unknown): Mode {
  const mode = MODES.find((candidate) => candidate === value);
  if (mode === undefined) {
    throw ValidationError.invalidOption('mode', value, MODES);
  }
  return mode;
}

function parseCharset(value: unknown): Charset {
  const key = typeof value === 'string' ? value.toLowerCase() : '';
  if (!Object.hasOwn(CHARSETS, key)) {
    throw ValidationError.invalidOption('charset', value, Object.keys(CHARSETS));
  }
  return CHARSETS[key];
}

function parseBoolean(option: string, value: string): boolean {
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  throw ValidationError.invalidOption(option, value, ['true', 'false', '1', '0']);
}

function parsePoolSize(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw ValidationError.outOfRange('poolSize', 'must be a positive integer', value);
  }
  return value;
}

/**
 * Reads `MBRIDGE_MODE`, `MBRIDGE_DEBUG`, `MBRIDGE_CHARSET` and
 * `MBRIDGE_AUTO_RELINK`.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<BridgeConfig> {
  const config: Partial<BridgeConfig> = {};
  if (env.MBRIDGE_MODE) {
    config.mode = parseMode(env.MBRIDGE_MODE);
  }
  if (env.MBRIDGE_DEBUG) {
    const rank = Number(env.MBRIDGE_DEBUG);
    config.debug = parseDebug(Number.isNaN(rank) ? env.MBRIDGE_DEBUG : rank);
  }
  if (env.MBRIDGE_CHARSET) {
    config.charset = parseCharset(env.MBRIDGE_CHARSET);
  }
  if (env.MBRIDGE_AUTO_RELINK) {
    config.autoRelink = parseBoolean('MBRIDGE_AUTO_RELINK', env.MBRIDGE_AUTO_RELINK);
  }
  return config;
}

/**
 * Merges `options` over `base`, validating every supplied value.
 *
 * @example
 * ```typescript
 * resolveConfig({ mode: 'strict', debug: 2 }, {}).debug; // 'medium'
 * ```
 */
export function resolveConfig(
  options: BridgeOptions = {},
  env: NodeJS.ProcessEnv = process.env,
  base: Readonly<BridgeConfig> = DEFAULT_CONFIG
): BridgeConfig {
  const config: BridgeConfig = { ...base, ...configFromEnv(env) };
  if (options.mode !== undefined) {
    config.mode = parseMode(options.mode);
  }
  if (options.debug !== undefined) {
    config.debug = parseDebug(options.debug);
  }
  if (options.charset !== undefined) {
    config.charset = parseCharset(options.charset);
  }
  if (options.autoRelink !== undefined) {
    config.autoRelink = options.autoRelink;
  }
  if (options.poolSize !== undefined) {
    config.poolSize = parsePoolSize(options.poolSize);
  }
  return config;
}
