import { hostname } from 'node:os';

import {
  JWE_ALGORITHMS,
  JWE_ENCRYPTIONS,
  JWS_ALGORITHMS,
  type JweAlgorithm,
  type JweEncryption,
  type JwsAlgorithm,
} from '../types.js';
import { ConfigurationError } from '../utils/errors.js';
import { createConsoleLogger, isLogLevel, type Logger } from '../utils/logger.js';

/** Default signing algorithm */
export const DEFAULT_JWS_ALGORITHM: JwsAlgorithm = 'ES256';

/** Default JWE key management algorithm */
export const DEFAULT_JWE_ALGORITHM: JweAlgorithm = 'RSA-OAEP';

/** Default JWE content encryption algorithm */
export const DEFAULT_JWE_ENCRYPTION: JweEncryption = 'A128CBC-HS256';

/** Keys expire 90 days after creation */
export const DEFAULT_DAYS_UNTIL_EXPIRE = 90;

/** Number of keys per type kept in the public JWKS */
export const DEFAULT_ALGORITHMS_TO_KEEP = 2;

/** Current keys are cached for 15 minutes (in milliseconds) */
export const DEFAULT_CACHE_TIME_MS = 15 * 60 * 1000;

/** RSA modulus length for RS*, PS* and RSA-OAEP* keys */
export const DEFAULT_RSA_MODULUS_LENGTH = 2048;

/** Prefix for generated key IDs */
export const DEFAULT_KEY_PREFIX = `${hostname()}_`;

export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Storage namespace constants
 * These are used to namespace data in the Keyv store to prevent collisions.
 */
export const STORAGE_NAMESPACES = {
  /** Key material records and per-type indexes */
  KEYS: 'jwks',
} as const;

/**
 * Options accepted by {@link JwksService}.
 */
export interface JwksOptions {
  /** Prepended to every generated key ID. Default: `<hostname>_` */
  keyPrefix: string;
  /** Signing algorithm for new JWS keys. Default: ES256 */
  jws: JwsAlgorithm;
  /** Key management algorithm for new JWE keys. Default: RSA-OAEP */
  jwe: JweAlgorithm;
  /** Content encryption for new JWE keys. Default: A128CBC-HS256 */
  jweEncryption: JweEncryption;
  /** Lifetime of a key before it is rotated. Default: 90 */
  daysUntilExpire: number;
  /** How many keys of each type are published and accepted. Default: 2 */
  algorithmsToKeep: number;
  /** How long the current key is served from memory (ms). Default: 15 minutes */
  cacheTime: number;
  logger: Logger;
}

export type ResolvedJwksOptions = Readonly<JwksOptions>;

export function isJwsAlgorithm(value: string): value is JwsAlgorithm {
  return JWS_ALGORITHMS.some((alg) => alg === value);
}

export function isJweAlgorithm(value: string): value is JweAlgorithm {
  return JWE_ALGORITHMS.some((alg) => alg === value);
}

export function isJweEncryption(value: string): value is JweEncryption {
  return JWE_ENCRYPTIONS.some((enc) => enc === value);
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Fill in defaults and validate JWKS options.
 *
 * @param options - Partial options, usually merged from service and per-call settings
 * @returns Complete, validated options
 * @throws ConfigurationError if a value is out of range or an algorithm is unknown
 */
export function resolveJwksOptions(options?: Partial<JwksOptions>): ResolvedJwksOptions {
  const resolved: JwksOptions = {
    keyPrefix: options?.keyPrefix ?? DEFAULT_KEY_PREFIX,
    jws: options?.jws ?? DEFAULT_JWS_ALGORITHM,
    jwe: options?.jwe ?? DEFAULT_JWE_ALGORITHM,
    jweEncryption: options?.jweEncryption ?? DEFAULT_JWE_ENCRYPTION,
    daysUntilExpire: options?.daysUntilExpire ?? DEFAULT_DAYS_UNTIL_EXPIRE,
    algorithmsToKeep: options?.algorithmsToKeep ?? DEFAULT_ALGORITHMS_TO_KEEP,
    cacheTime: options?.cacheTime ?? DEFAULT_CACHE_TIME_MS,
    logger: options?.logger ?? createConsoleLogger(),
  };

  // Options may come from untyped sources (JSON files, plain JS callers)
  if (!isJwsAlgorithm(resolved.jws)) {
    throw new ConfigurationError(`Unknown JWS algorithm: ${resolved.jws}`);
  }
  if (!isJweAlgorithm(resolved.jwe)) {
    throw new ConfigurationError(`Unknown JWE algorithm: ${resolved.jwe}`);
  }
  if (!isJweEncryption(resolved.jweEncryption)) {
    throw new ConfigurationError(`Unknown JWE encryption: ${resolved.jweEncryption}`);
  }
  assertPositiveInteger('daysUntilExpire', resolved.daysUntilExpire);
  assertPositiveInteger('algorithmsToKeep', resolved.algorithmsToKeep);
  if (!Number.isFinite(resolved.cacheTime) || resolved.cacheTime < 0) {
    throw new ConfigurationError(`cacheTime must be zero or more, got ${resolved.cacheTime}`);
  }

  return Object.freeze(resolved);
}

function parseIntegerVariable(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

/**
 * Read JWKS options from environment variables.
 *
 * | Variable                  | Option            |
 * |---------------------------|-------------------|
 * | `JWKS_KEY_PREFIX`         | `keyPrefix`       |
 * | `JWKS_JWS_ALGORITHM`      | `jws`             |
 * | `JWKS_JWE_ALGORITHM`      | `jwe`             |
 * | `JWKS_JWE_ENCRYPTION`     | `jweEncryption`   |
 * | `JWKS_DAYS_UNTIL_EXPIRE`  | `daysUntilExpire` |
 * | `JWKS_ALGORITHMS_TO_KEEP` | `algorithmsToKeep`|
 * | `JWKS_CACHE_TIME_MS`      | `cacheTime`       |
 * | `JWKS_LOG_LEVEL`          | console logger level |
 *
 * Unset variables are left out so that defaults apply.
 *
 * @example
 * ```typescript
 * const service = new JwksService(new InMemoryStore(), new JwkService(), loadJwksOptionsFromEnv());
 * ```
 */
export function loadJwksOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<JwksOptions> {
  const options: Partial<JwksOptions> = {};

  if (env.JWKS_KEY_PREFIX !== undefined) {
    options.keyPrefix = env.JWKS_KEY_PREFIX;
  }

  const jws = env.JWKS_JWS_ALGORITHM;
  if (jws) {
    if (!isJwsAlgorithm(jws)) {
      throw new ConfigurationError(`JWKS_JWS_ALGORITHM is not a supported algorithm: ${jws}`);
    }
    options.jws = jws;
  }

  const jwe = env.JWKS_JWE_ALGORITHM;
  if (jwe) {
    if (!isJweAlgorithm(jwe)) {
      throw new ConfigurationError(`JWKS_JWE_ALGORITHM is not a supported algorithm: ${jwe}`);
    }
    options.jwe = jwe;
  }

  const enc = env.JWKS_JWE_ENCRYPTION;
  if (enc) {
    if (!isJweEncryption(enc)) {
      throw new ConfigurationError(`JWKS_JWE_ENCRYPTION is not a supported encryption: ${enc}`);
    }
    options.jweEncryption = enc;
  }

  const days = parseIntegerVariable(env, 'JWKS_DAYS_UNTIL_EXPIRE');
  if (days !== undefined) {
    options.daysUntilExpire = days;
  }

  const keep = parseIntegerVariable(env, 'JWKS_ALGORITHMS_TO_KEEP');
  if (keep !== undefined) {
    options.algorithmsToKeep = keep;
  }

  const cacheTime = parseIntegerVariable(env, 'JWKS_CACHE_TIME_MS');
  if (cacheTime !== undefined) {
    options.cacheTime = cacheTime;
  }

  const level = env.JWKS_LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new ConfigurationError(`JWKS_LOG_LEVEL must be one of debug, info, warn, error`);
    }
    options.logger = createConsoleLogger(level, 'jwks');
  }

  return options;
}
