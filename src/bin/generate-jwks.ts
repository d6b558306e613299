#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

import {
  DEFAULT_JWE_ALGORITHM,
  DEFAULT_JWE_ENCRYPTION,
  DEFAULT_JWS_ALGORITHM,
  isJweAlgorithm,
  isJweEncryption,
  isJwsAlgorithm,
} from '../core/config.js';
import { JwkService } from '../core/jwk-service.js';
import { toPublicJwk } from '../core/key-material.js';
import type { JsonWebKeyType, JWKS, KeyMaterial } from '../types.js';

export const HELP_TEXT = `
jwks-keyring - Generate a JSON Web Key Set

Usage:
  npx jwks-keyring [options]

Options:
  -t, --type <jws|jwe>   Key type (default: jws)
  -a, --alg <alg>        Algorithm (default: ${DEFAULT_JWS_ALGORITHM} for jws, ${DEFAULT_JWE_ALGORITHM} for jwe)
  -e, --enc <enc>        Content encryption for jwe keys (default: ${DEFAULT_JWE_ENCRYPTION})
      --prefix <prefix>  Prefix for the key ID (default: none)
      --public           Print only the public key
  -p, --pretty           Pretty print the JSON output
  -h, --help             Show this help message

Example:
  npx jwks-keyring > jwks.json
  npx jwks-keyring --alg RS256 --pretty
  npx jwks-keyring --type jwe --alg RSA-OAEP-256 --enc A256GCM
`;

/**
 * Output streams, injectable for tests.
 */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

interface CliArgs {
  type: JsonWebKeyType;
  alg?: string;
  enc?: string;
  prefix: string;
  publicOnly: boolean;
  pretty: boolean;
  help: boolean;
}

const VALUE_FLAGS = new Map<string, 'type' | 'alg' | 'enc' | 'prefix'>([
  ['-t', 'type'],
  ['--type', 'type'],
  ['-a', 'alg'],
  ['--alg', 'alg'],
  ['-e', 'enc'],
  ['--enc', 'enc'],
  ['--prefix', 'prefix'],
]);

const BOOLEAN_FLAGS = new Set(['-p', '--pretty', '-h', '--help', '--public']);

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { type: 'jws', prefix: '', publicOnly: false, pretty: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const [flag, inlineValue] = args[i].split(/=(.*)/s, 2);

    if (BOOLEAN_FLAGS.has(flag) && inlineValue !== undefined) {
      throw new Error(`${flag} does not take a value`);
    }

    if (flag === '--pretty' || flag === '-p') {
      parsed.pretty = true;
    } else if (flag === '--help' || flag === '-h') {
      parsed.help = true;
    } else if (flag === '--public') {
      parsed.publicOnly = true;
    } else {
      const name = VALUE_FLAGS.get(flag);
      if (!name) {
        throw new Error(`Unknown option: ${flag}`);
      }
      const value = inlineValue ?? args[++i];
      if (value === undefined) {
        throw new Error(`Missing value for ${flag}`);
      }
      if (name === 'type') {
        if (value !== 'jws' && value !== 'jwe') {
          throw new Error(`--type must be jws or jwe, got ${value}`);
        }
        parsed.type = value;
      } else {
        parsed[name] = value;
      }
    }
  }

  if (parsed.type === 'jws' && parsed.enc !== undefined) {
    throw new Error('--enc only applies to --type jwe');
  }

  return parsed;
}

async function generate(args: CliArgs): Promise<KeyMaterial> {
  const jwkService = new JwkService();
  const options = { keyPrefix: args.prefix };

  if (args.type === 'jws') {
    const alg = args.alg ?? DEFAULT_JWS_ALGORITHM;
    if (!isJwsAlgorithm(alg)) {
      throw new Error(`Unsupported JWS algorithm: ${alg}`);
    }
    return jwkService.generateSigningKey(alg, options);
  }

  const alg = args.alg ?? DEFAULT_JWE_ALGORITHM;
  const enc = args.enc ?? DEFAULT_JWE_ENCRYPTION;
  if (!isJweAlgorithm(alg)) {
    throw new Error(`Unsupported JWE algorithm: ${alg}`);
  }
  if (!isJweEncryption(enc)) {
    throw new Error(`Unsupported JWE encryption: ${enc}`);
  }
  return jwkService.generateEncryptingKey(alg, enc, options);
}

/**
 * Run the CLI.
 *
 * @returns Process exit code
 */
export async function runCli(args: string[], io: CliIo): Promise<number> {
  let parsed: CliArgs;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    io.stderr(error instanceof Error ? error.message : String(error));
    io.stderr(HELP_TEXT);
    return 1;
  }

  if (parsed.help) {
    io.stdout(HELP_TEXT);
    return 0;
  }

  try {
    const material = await generate(parsed);
    const jwk = parsed.publicOnly ? toPublicJwk(material.parameters) : material.parameters;
    const jwks: JWKS = { keys: [jwk] };
    io.stdout(parsed.pretty ? JSON.stringify(jwks, null, 2) : JSON.stringify(jwks));
    return 0;
  } catch (error) {
    io.stderr(`Failed to generate JWKS: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2), {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
  }).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error('Failed to generate JWKS:', error);
      process.exit(1);
    }
  );
}
