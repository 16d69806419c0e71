import type { JWK } from 'jose';
import { UnknownIssuerError } from './errors.js';
import { toPublicJwkEd25519 } from './keys.js';

// did:key for Ed25519 uses multicodec 0xED (0xED01 as varint) prefixed to raw 32-byte pubkey, then base58btc (multibase 'z')
// Reference: https://w3c-ccg.github.io/did-method-key/

import bs58 from 'bs58';

const DID_KEY_PREFIX = 'did:key:z';

function varintEd25519Header(): Uint8Array {
  // 0xED 0x01 in little-endian varint encoding
  return new Uint8Array([0xED, 0x01]);
}

export function didKeyFromPublicKeyEd25519(publicKey: Uint8Array): string {
  const header = varintEd25519Header();
  const bytes = new Uint8Array(header.length + publicKey.length);
  bytes.set(header, 0);
  bytes.set(publicKey, header.length);
  const mb = 'z' + bs58.encode(bytes);
  return `did:key:${mb}`;
}

export function publicKeyFromDidKey(did: string): Uint8Array {
  if (!did.startsWith(DID_KEY_PREFIX)) throw new UnknownIssuerError('not a base58btc did:key identifier');
  let bytes: Uint8Array;
  try {
    bytes = bs58.decode(did.slice(DID_KEY_PREFIX.length));
  } catch (err) {
    throw new UnknownIssuerError('did:key identifier is not valid base58btc', { cause: err });
  }
  const header = varintEd25519Header();
  if (bytes.length !== header.length + 32 || bytes[0] !== header[0] || bytes[1] !== header[1]) {
    throw new UnknownIssuerError('did:key identifier is not an Ed25519 key');
  }
  return bytes.slice(header.length);
}

/** Issuer key callback for issuers identified by their own Ed25519 did:key. */
export function didKeyResolver(issuer: string): JWK {
  return toPublicJwkEd25519(publicKeyFromDidKey(issuer));
}
