import { CompactSign, compactVerify, errors, importJWK, type JWK } from 'jose';
import { EncodingError, InvalidSignatureError, SigningError } from './errors.js';
import { isJsonObject, isJsonValue, type JsonObject } from './json.js';

export const SIGNATURE_ALGORITHMS = ['EdDSA', 'ES256', 'ES384', 'ES512', 'PS256', 'RS256'] as const;
export type SignatureAlgorithm = (typeof SIGNATURE_ALGORITHMS)[number];

export type CompactHeader = { alg: string; typ?: string; kid?: string };

const COMPACT_JWS = /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]*$/;

export function isCompactJws(value: string): boolean {
  return COMPACT_JWS.test(value);
}

function decodeJsonPart(part: string, what: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(part, 'base64url').toString('utf8'));
  } catch (err) {
    throw new EncodingError(`${what} is not valid JSON`, { cause: err });
  }
  if (!isJsonObject(parsed) || !isJsonValue(parsed)) throw new EncodingError(`${what} must be a JSON object`);
  return parsed;
}

/** Reads header and payload without checking the signature. */
export function decodeCompact(token: string): { header: CompactHeader; payload: JsonObject } {
  if (!isCompactJws(token)) throw new EncodingError('signed object is not a compact JWS');
  const [headerPart, payloadPart] = token.split('.');
  const header = decodeJsonPart(headerPart, 'JWS header');
  const { alg, typ, kid } = header;
  if (typeof alg !== 'string') throw new EncodingError('JWS header carries no algorithm');
  return {
    header: {
      alg,
      ...(typeof typ === 'string' ? { typ } : {}),
      ...(typeof kid === 'string' ? { kid } : {}),
    },
    payload: decodeJsonPart(payloadPart, 'JWS payload'),
  };
}

export async function signCompact(
  payload: JsonObject,
  opts: { key: JWK; alg: SignatureAlgorithm; typ?: string },
): Promise<string> {
  const header: CompactHeader = { alg: opts.alg };
  if (opts.typ) header.typ = opts.typ;
  if (opts.key.kid) header.kid = opts.key.kid;
  try {
    const key = await importJWK(opts.key, opts.alg);
    return await new CompactSign(new TextEncoder().encode(JSON.stringify(payload)))
      .setProtectedHeader(header)
      .sign(key);
  } catch (err) {
    throw new SigningError(`signing with ${opts.alg} failed`, { cause: err });
  }
}

export async function verifyCompact(
  token: string,
  opts: { key: JWK; algorithms: readonly SignatureAlgorithm[] },
): Promise<{ header: CompactHeader; payload: JsonObject }> {
  const decoded = decodeCompact(token);
  const alg = decoded.header.alg;
  if (!(opts.algorithms as readonly string[]).includes(alg)) {
    throw new InvalidSignatureError(`signature algorithm ${alg} is not accepted`);
  }
  let key: Awaited<ReturnType<typeof importJWK>>;
  try {
    key = await importJWK(opts.key, alg);
  } catch (err) {
    throw new InvalidSignatureError(`verification key cannot be used with ${alg}`, { cause: err });
  }
  try {
    await compactVerify(token, key, { algorithms: [alg] });
  } catch (err) {
    if (err instanceof errors.JWSInvalid) throw new EncodingError('signed object is malformed', { cause: err });
    throw new InvalidSignatureError('signature verification failed', { cause: err });
  }
  return decoded;
}
