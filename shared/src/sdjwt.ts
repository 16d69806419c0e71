import { sha256 } from '@noble/hashes/sha256';
import { sha384, sha512 } from '@noble/hashes/sha512';
import { DuplicateDigestError, EncodingError } from './errors.js';
import { canonicalizeJson, isJsonValue, type JsonValue } from './json.js';
import type { RandomSource } from './random.js';

export const DIGEST_ALGORITHMS = ['sha-256', 'sha-384', 'sha-512'] as const;
export type DigestAlgorithm = (typeof DIGEST_ALGORITHMS)[number];

export const SD_DIGESTS_KEY = '_sd';
export const SD_ALG_KEY = '_sd_alg';
export const ARRAY_DIGEST_KEY = '...';
export const HOLDER_BINDING_TYP = 'kb+jwt';
export const RESERVED_CLAIM_NAMES: readonly string[] = [SD_DIGESTS_KEY, ARRAY_DIGEST_KEY];

const SALT_BYTES = 16;
const BASE64URL = /^[A-Za-z0-9_-]+$/;

const hashers: Record<DigestAlgorithm, (data: Uint8Array) => Uint8Array> = {
  'sha-256': sha256,
  'sha-384': sha384,
  'sha-512': sha512,
};

export function isDigestAlgorithm(value: unknown): value is DigestAlgorithm {
  return typeof value === 'string' && (DIGEST_ALGORITHMS as readonly string[]).includes(value);
}

function b64u(buf: Uint8Array) { return Buffer.from(buf).toString('base64url'); }

/**
 * One selectively disclosable claim. `key` is absent for array elements.
 * `encoded` is the exact wire form; `digest` is computed over it.
 */
export type Disclosure = {
  salt: string;
  key?: string;
  value: JsonValue;
  encoded: string;
  digest: string;
};

export function generateSalt(random: RandomSource): string {
  return b64u(random.bytes(SALT_BYTES));
}

export function digestOf(encoded: string, alg: DigestAlgorithm): string {
  return b64u(hashers[alg](new TextEncoder().encode(encoded)));
}

export function makeDisclosure(salt: string, key: string | undefined, value: JsonValue, alg: DigestAlgorithm): Disclosure {
  const arr: JsonValue[] = key === undefined ? [salt, value] : [salt, key, value];
  const encoded = b64u(new TextEncoder().encode(canonicalizeJson(arr)));
  const digest = digestOf(encoded, alg);
  return key === undefined ? { salt, value, encoded, digest } : { salt, key, value, encoded, digest };
}

export function parseDisclosure(encoded: string, alg: DigestAlgorithm): Disclosure {
  if (!BASE64URL.test(encoded)) throw new EncodingError('disclosure is not base64url');
  let arr: unknown;
  try {
    arr = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'));
  } catch (err) {
    throw new EncodingError('disclosure is not valid JSON', { cause: err });
  }
  if (!Array.isArray(arr) || (arr.length !== 2 && arr.length !== 3)) {
    throw new EncodingError('disclosure must be a JSON array of two or three elements');
  }
  const salt: unknown = arr[0];
  if (typeof salt !== 'string' || salt.length === 0) throw new EncodingError('disclosure salt must be a non-empty string');
  const value: unknown = arr[arr.length - 1];
  if (!isJsonValue(value)) throw new EncodingError('disclosure value is not JSON');
  const digest = digestOf(encoded, alg);
  if (arr.length === 2) return { salt, value, encoded, digest };

  const key: unknown = arr[1];
  if (typeof key !== 'string') throw new EncodingError('disclosure claim name must be a string');
  if (RESERVED_CLAIM_NAMES.includes(key)) throw new EncodingError(`disclosure uses reserved claim name "${key}"`);
  return { salt, key, value, encoded, digest };
}

/** A digest over fresh random bytes, shaped like any real disclosure digest. */
export function decoyDigest(random: RandomSource, alg: DigestAlgorithm): string {
  return digestOf(generateSalt(random), alg);
}

export type DigestIndex = ReadonlyMap<string, Disclosure>;

export function buildIndex(disclosures: readonly Disclosure[]): DigestIndex {
  const index = new Map<string, Disclosure>();
  for (const disclosure of disclosures) {
    if (index.has(disclosure.digest)) {
      const what = disclosure.key === undefined ? 'an array element' : `claim "${disclosure.key}"`;
      throw new DuplicateDigestError(`two disclosures share one digest (${what})`);
    }
    index.set(disclosure.digest, disclosure);
  }
  return index;
}

/** `_sd_alg` of a payload; SHA-256 when the issuer did not name one. */
export function digestAlgorithmOf(payload: { [SD_ALG_KEY]?: unknown }): DigestAlgorithm {
  const alg = payload[SD_ALG_KEY];
  if (alg === undefined) return 'sha-256';
  if (!isDigestAlgorithm(alg)) throw new EncodingError('payload names an unsupported digest algorithm');
  return alg;
}
