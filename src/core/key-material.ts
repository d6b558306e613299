import { importJWK, type JWK } from 'jose';

import type {
  EncryptingCredentials,
  KeyMaterial,
  SecurityKey,
  SigningCredentials,
} from '../types.js';
import { KeyManagementError } from '../utils/errors.js';
import { isJweAlgorithm, isJweEncryption, isJwsAlgorithm } from './config.js';

/**
 * JWK members that carry private or secret key data (RFC 7518 section 6).
 */
const PRIVATE_MEMBERS = ['d', 'p', 'q', 'dp', 'dq', 'qi', 'oth', 'k'] as const;

/**
 * Copy a JWK without its private members.
 */
export function toPublicJwk(jwk: JWK): JWK {
  const publicJwk: JWK = { ...jwk };
  for (const member of PRIVATE_MEMBERS) {
    delete publicJwk[member];
  }
  return publicJwk;
}

/**
 * Newest first. Ties keep insertion order reversed, so the key stored last wins.
 */
export function sortNewestFirst(keys: KeyMaterial[]): KeyMaterial[] {
  return keys
    .map((key, index) => ({ key, index }))
    .sort((a, b) => b.key.createdAt - a.key.createdAt || b.index - a.index)
    .map(({ key }) => key);
}

export function isSymmetric(material: KeyMaterial): boolean {
  return material.parameters.kty === 'oct';
}

export function hasPrivateMembers(jwk: JWK): boolean {
  return typeof jwk.d === 'string' || typeof jwk.k === 'string';
}

export function isExpired(material: KeyMaterial, now: number = Date.now()): boolean {
  return now >= material.expiresAt;
}

/**
 * Build the revoked form of a key: flagged, with only its public members left.
 */
export function revokeKeyMaterial(material: KeyMaterial, reason?: string): KeyMaterial {
  return {
    ...material,
    parameters: toPublicJwk(material.parameters),
    isRevoked: true,
    revokedReason: reason,
  };
}

/**
 * Import the verification (JWS) or encryption (JWE) half of a key.
 *
 * @returns The security key, or undefined for a revoked symmetric key
 */
export async function toSecurityKey(material: KeyMaterial): Promise<SecurityKey | undefined> {
  let jwk: JWK;
  if (isSymmetric(material)) {
    if (typeof material.parameters.k !== 'string') {
      return undefined;
    }
    jwk = { ...material.parameters };
  } else {
    jwk = toPublicJwk(material.parameters);
  }

  const key = await importJWK(jwk, material.algorithm);
  return {
    keyId: material.keyId,
    type: material.type,
    algorithm: material.algorithm,
    key,
    jwk,
  };
}

async function requireSecurityKey(material: KeyMaterial): Promise<SecurityKey> {
  const securityKey = await toSecurityKey(material);
  if (!securityKey) {
    throw new KeyManagementError(`Key ${material.keyId} has no usable key material`);
  }
  return securityKey;
}

function assertUsable(material: KeyMaterial): void {
  if (material.isRevoked || !hasPrivateMembers(material.parameters)) {
    throw new KeyManagementError(`Key ${material.keyId} is revoked and cannot be used`);
  }
}

/**
 * Import a stored JWS key as signing credentials.
 *
 * @throws KeyManagementError if the key is revoked or not a signing key
 */
export async function toSigningCredentials(material: KeyMaterial): Promise<SigningCredentials> {
  const { algorithm } = material;
  if (material.type !== 'jws' || !isJwsAlgorithm(algorithm)) {
    throw new KeyManagementError(`Key ${material.keyId} is not a signing key`);
  }
  assertUsable(material);

  const key = await importJWK(material.parameters, algorithm);
  return {
    kid: material.keyId,
    algorithm,
    key,
    securityKey: await requireSecurityKey(material),
  };
}

/**
 * Import a stored JWE key as encrypting credentials.
 *
 * @throws KeyManagementError if the key is revoked or not an encryption key
 */
export async function toEncryptingCredentials(
  material: KeyMaterial
): Promise<EncryptingCredentials> {
  const { algorithm, encryption } = material;
  if (
    material.type !== 'jwe' ||
    !isJweAlgorithm(algorithm) ||
    encryption === undefined ||
    !isJweEncryption(encryption)
  ) {
    throw new KeyManagementError(`Key ${material.keyId} is not an encryption key`);
  }
  assertUsable(material);

  const decryptionKey = await importJWK(material.parameters, algorithm);
  return {
    key: await requireSecurityKey(material),
    algorithm,
    encryption,
    decryptionKey,
  };
}
