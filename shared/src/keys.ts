import { ed25519 } from '@noble/curves/ed25519';
import { sha256 } from '@noble/hashes/sha256';
import type { JWK } from 'jose';
import { calculateJwkThumbprint } from 'jose';
import { JwkSchema } from './config.js';

export type Ed25519KeyPair = {
  privateKey: Uint8Array; // 32 bytes
  publicKey: Uint8Array; // 32 bytes
};

const PRIVATE_JWK_MEMBERS: readonly (keyof JWK)[] = ['d', 'p', 'q', 'dp', 'dq', 'qi', 'k'];

export function generateEd25519KeyPair(seed?: Uint8Array): Ed25519KeyPair {
  let privateKey: Uint8Array;
  if (seed) {
    if (!(seed instanceof Uint8Array)) throw new TypeError('seed must be Uint8Array');
    if (seed.length !== 32) throw new Error('seed must be 32 bytes for Ed25519');
    privateKey = new Uint8Array(seed);
  } else {
    privateKey = ed25519.utils.randomPrivateKey();
  }
  const publicKey = ed25519.getPublicKey(privateKey);
  return { privateKey, publicKey };
}

/** Stable key pair for fixtures: the seed is SHA-256(label). */
export function deriveEd25519KeyPair(label: string): Ed25519KeyPair {
  return generateEd25519KeyPair(sha256(new TextEncoder().encode(label)));
}

export function toPublicJwkEd25519(publicKey: Uint8Array): JWK {
  if (publicKey.length !== 32) throw new Error('publicKey must be 32 bytes');
  return {
    kty: 'OKP',
    crv: 'Ed25519',
    x: Buffer.from(publicKey).toString('base64url'),
  } satisfies JWK;
}

export function toPrivateJwkEd25519(privateKey: Uint8Array): JWK {
  if (privateKey.length !== 32) throw new Error('privateKey must be 32 bytes');
  const publicKey = ed25519.getPublicKey(privateKey);
  return {
    kty: 'OKP',
    crv: 'Ed25519',
    x: Buffer.from(publicKey).toString('base64url'),
    d: Buffer.from(privateKey).toString('base64url'),
  } satisfies JWK;
}

/** Narrows JSON (for example `cnf.jwk`) to a JWK, or undefined when it is not one. */
export function parseJwk(value: unknown): JWK | undefined {
  const result = JwkSchema.safeParse(value);
  return result.success ? result.data : undefined;
}

export function isPrivateJwk(jwk: JWK): boolean {
  return PRIVATE_JWK_MEMBERS.some((member) => jwk[member] !== undefined);
}

export function toPublicJwk(jwk: JWK): JWK {
  const pub: JWK = { ...jwk };
  for (const member of PRIVATE_JWK_MEMBERS) delete pub[member];
  return pub;
}

export async function jwkThumbprintSha256(jwk: JWK): Promise<string> {
  // RFC 7638 JWK Thumbprint (base64url, no padding) using SHA-256
  return calculateJwkThumbprint(jwk, 'sha256');
}
