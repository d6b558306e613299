import {
  CompactEncrypt,
  EncryptJWT,
  SignJWT,
  compactDecrypt,
  decodeProtectedHeader,
  errors,
  jwtDecrypt,
  jwtVerify,
  type JWTClaimVerificationOptions,
  type JWTPayload,
  type ProtectedHeaderParameters,
} from 'jose';

import type { EncryptingCredentials, SecurityKey, SigningCredentials } from '../types.js';
import { KeyManagementError } from '../utils/errors.js';
import { noopLogger, type Logger } from '../utils/logger.js';

/** Lifetime of a token created without `expires`: 60 minutes (in seconds) */
export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

/**
 * What to put in a token and how to protect it.
 * At least one of `signingCredentials` and `encryptingCredentials` is required.
 */
export interface TokenDescriptor {
  issuer?: string;
  audience?: string | string[];
  subject?: string;
  /** Default: now */
  issuedAt?: Date;
  notBefore?: Date;
  /** Default: issuedAt + 60 minutes */
  expires?: Date;
  /** Additional claims; registered claims above take precedence */
  claims?: Record<string, unknown>;
  signingCredentials?: SigningCredentials;
  encryptingCredentials?: EncryptingCredentials;
}

export interface TokenValidationParameters {
  issuer?: string | string[];
  audience?: string | string[];
  /** Keys a JWS may be signed with, matched by kid */
  signingKeys?: SecurityKey[];
  /** Keys a JWE may be encrypted to, matched by kid */
  decryptionKeys?: EncryptingCredentials[];
  /**
   * Reject encrypted tokens that do not wrap a signed token.
   * Default: true
   */
  requireSignedTokens?: boolean;
  /** Allowed clock skew in seconds */
  clockTolerance?: number;
}

/**
 * Result of token validation.
 */
export interface TokenValidationResult {
  /** Whether the token is valid */
  isValid: boolean;
  /** Claims, if valid */
  payload?: JWTPayload;
  /** Header of the innermost token, if valid */
  protectedHeader?: ProtectedHeaderParameters;
  /** Error message if invalid */
  error?: string;
  /** `jose` error code (e.g. ERR_JWT_EXPIRED) if the library rejected the token */
  errorCode?: string;
}

export interface TokenHandlerOptions {
  logger?: Logger;
}

export interface TokenHandler {
  createToken(descriptor: TokenDescriptor): Promise<string>;
  validateToken(token: string, parameters?: TokenValidationParameters): Promise<TokenValidationResult>;
}

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function buildPayload(descriptor: TokenDescriptor): JWTPayload {
  const issuedAt = toEpochSeconds(descriptor.issuedAt ?? new Date());
  const payload: JWTPayload = {
    ...descriptor.claims,
    iat: issuedAt,
    exp: descriptor.expires
      ? toEpochSeconds(descriptor.expires)
      : issuedAt + DEFAULT_TOKEN_LIFETIME_SECONDS,
  };

  if (descriptor.issuer !== undefined) payload.iss = descriptor.issuer;
  if (descriptor.audience !== undefined) payload.aud = descriptor.audience;
  if (descriptor.subject !== undefined) payload.sub = descriptor.subject;
  if (descriptor.notBefore) payload.nbf = toEpochSeconds(descriptor.notBefore);

  return payload;
}

/**
 * Pick the key a token names in its `kid` header. A token without a kid
 * is accepted only when exactly one key is configured.
 */
function selectKey<T>(keys: T[], keyIdOf: (key: T) => string, kid: string | undefined): T {
  if (keys.length === 0) {
    throw new KeyManagementError('No keys configured for this token');
  }
  if (kid === undefined) {
    if (keys.length === 1) {
      return keys[0];
    }
    throw new KeyManagementError('Token has no kid and more than one key is configured');
  }

  const key = keys.find((candidate) => keyIdOf(candidate) === kid);
  if (!key) {
    throw new KeyManagementError(`No key found for kid ${kid}`);
  }
  return key;
}

/**
 * Create a handler that issues and validates JWTs with managed credentials.
 *
 * - signing credentials only: compact JWS
 * - encrypting credentials only: JWE carrying the claims
 * - both: JWS nested in a JWE (`cty: "JWT"`)
 *
 * @example
 * ```typescript
 * const handler = createTokenHandler();
 * const token = await handler.createToken({
 *   issuer: 'me',
 *   audience: 'you',
 *   signingCredentials: await jwks.getCurrentSigningCredentials(),
 * });
 *
 * const result = await handler.validateToken(token, {
 *   issuer: 'me',
 *   audience: 'you',
 *   signingKeys: await jwks.getLastKeysCredentials('jws'),
 * });
 * ```
 */
export function createTokenHandler(options: TokenHandlerOptions = {}): TokenHandler {
  const logger = options.logger ?? noopLogger;

  async function sign(payload: JWTPayload, credentials: SigningCredentials): Promise<string> {
    return new SignJWT(payload)
      .setProtectedHeader({ alg: credentials.algorithm, kid: credentials.kid, typ: 'JWT' })
      .sign(credentials.key);
  }

  async function createToken(descriptor: TokenDescriptor): Promise<string> {
    const { signingCredentials, encryptingCredentials } = descriptor;
    const payload = buildPayload(descriptor);

    if (signingCredentials && encryptingCredentials) {
      const jws = await sign(payload, signingCredentials);
      return new CompactEncrypt(new TextEncoder().encode(jws))
        .setProtectedHeader({
          alg: encryptingCredentials.algorithm,
          enc: encryptingCredentials.encryption,
          kid: encryptingCredentials.key.keyId,
          cty: 'JWT',
        })
        .encrypt(encryptingCredentials.key.key);
    }

    if (signingCredentials) {
      return sign(payload, signingCredentials);
    }

    if (encryptingCredentials) {
      return new EncryptJWT(payload)
        .setProtectedHeader({
          alg: encryptingCredentials.algorithm,
          enc: encryptingCredentials.encryption,
          kid: encryptingCredentials.key.keyId,
          typ: 'JWT',
        })
        .encrypt(encryptingCredentials.key.key);
    }

    throw new KeyManagementError('A token needs signing or encrypting credentials');
  }

  function claimOptions(parameters: TokenValidationParameters): JWTClaimVerificationOptions {
    return {
      issuer: parameters.issuer,
      audience: parameters.audience,
      clockTolerance: parameters.clockTolerance,
    };
  }

  async function verifySigned(
    token: string,
    parameters: TokenValidationParameters
  ): Promise<TokenValidationResult> {
    const signingKeys = parameters.signingKeys ?? [];
    const { payload, protectedHeader } = await jwtVerify(
      token,
      async (header) => {
        const securityKey = selectKey(signingKeys, (key) => key.keyId, header.kid);
        if (securityKey.algorithm !== header.alg) {
          throw new KeyManagementError(
            `Token algorithm ${header.alg} does not match key ${securityKey.keyId}`
          );
        }
        return securityKey.key;
      },
      claimOptions(parameters)
    );
    return { isValid: true, payload, protectedHeader };
  }

  async function validateEncrypted(
    token: string,
    header: ProtectedHeaderParameters,
    parameters: TokenValidationParameters
  ): Promise<TokenValidationResult> {
    const credentials = selectKey(
      parameters.decryptionKeys ?? [],
      (key) => key.key.keyId,
      header.kid
    );
    const algorithms = {
      keyManagementAlgorithms: [credentials.algorithm],
      contentEncryptionAlgorithms: [credentials.encryption],
    };

    if (header.cty?.toUpperCase() === 'JWT') {
      const { plaintext } = await compactDecrypt(token, credentials.decryptionKey, algorithms);
      return verifySigned(new TextDecoder().decode(plaintext), parameters);
    }

    if (parameters.requireSignedTokens ?? true) {
      throw new KeyManagementError('Token is encrypted but not signed');
    }

    const { payload, protectedHeader } = await jwtDecrypt(token, credentials.decryptionKey, {
      ...claimOptions(parameters),
      ...algorithms,
    });
    return { isValid: true, payload, protectedHeader };
  }

  async function validateToken(
    token: string,
    parameters: TokenValidationParameters = {}
  ): Promise<TokenValidationResult> {
    try {
      const header = decodeProtectedHeader(token);
      if (header.enc !== undefined) {
        return await validateEncrypted(token, header, parameters);
      }
      return await verifySigned(token, parameters);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const errorCode = error instanceof errors.JOSEError ? error.code : undefined;
      logger.debug('Token validation failed', { error: message, code: errorCode });
      return { isValid: false, error: message, errorCode };
    }
  }

  return { createToken, validateToken };
}
