import { DuplicateDigestError, EncodingError } from './errors.js';
import {
  formatClaimPath,
  hasOwn,
  isJsonObject,
  setOwn,
  type ClaimPath,
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
} from './json.js';
import { ARRAY_DIGEST_KEY, SD_DIGESTS_KEY, type Disclosure, type DigestIndex } from './sdjwt.js';

/**
 * Claim tree with digest placeholders made explicit.
 * `object.digests` is the `_sd` list; `placeholder` only occurs as an array item (`{"...": digest}`).
 */
export type ClaimNode =
  | { kind: 'scalar'; value: JsonPrimitive }
  | { kind: 'array'; items: ClaimNode[] }
  | { kind: 'object'; claims: Map<string, ClaimNode>; digests: string[] }
  | { kind: 'placeholder'; digest: string };

export type ObjectNode = Extract<ClaimNode, { kind: 'object' }>;

export function parseClaimTree(value: JsonValue, path: ClaimPath = []): ClaimNode {
  if (Array.isArray(value)) {
    return {
      kind: 'array',
      items: value.map((item, i): ClaimNode => {
        if (!isJsonObject(item) || !hasOwn(item, ARRAY_DIGEST_KEY)) return parseClaimTree(item, [...path, i]);
        const digest = item[ARRAY_DIGEST_KEY];
        if (Object.keys(item).length !== 1 || typeof digest !== 'string') {
          throw new EncodingError(`malformed array digest placeholder at ${formatClaimPath([...path, i])}`);
        }
        return { kind: 'placeholder', digest };
      }),
    };
  }
  if (isJsonObject(value)) {
    const claims = new Map<string, ClaimNode>();
    let digests: string[] = [];
    for (const [key, child] of Object.entries(value)) {
      if (key === SD_DIGESTS_KEY) {
        digests = parseDigestList(child, path);
      } else if (key === ARRAY_DIGEST_KEY) {
        throw new EncodingError(`array digest placeholder outside an array at ${formatClaimPath(path)}`);
      } else {
        claims.set(key, parseClaimTree(child, [...path, key]));
      }
    }
    return { kind: 'object', claims, digests };
  }
  return { kind: 'scalar', value };
}

function parseDigestList(value: JsonValue, path: ClaimPath): string[] {
  if (!Array.isArray(value)) throw new EncodingError(`_sd must be an array at ${formatClaimPath(path)}`);
  const seen = new Set<string>();
  return value.map((digest) => {
    if (typeof digest !== 'string') throw new EncodingError(`_sd entries must be strings at ${formatClaimPath(path)}`);
    if (seen.has(digest)) throw new DuplicateDigestError(`_sd repeats a digest at ${formatClaimPath(path)}`);
    seen.add(digest);
    return digest;
  });
}

export function claimTreeToJson(node: ClaimNode): JsonValue {
  switch (node.kind) {
    case 'scalar':
      return node.value;
    case 'placeholder':
      return { [ARRAY_DIGEST_KEY]: node.digest };
    case 'array':
      return node.items.map(claimTreeToJson);
    case 'object':
      return objectNodeToJson(node);
  }
}

export function objectNodeToJson(node: ObjectNode): JsonObject {
  const out: JsonObject = {};
  for (const [key, child] of node.claims) setOwn(out, key, claimTreeToJson(child));
  if (node.digests.length > 0) out[SD_DIGESTS_KEY] = [...node.digests];
  return out;
}

export type ResolvedDisclosure = { disclosure: Disclosure; path: ClaimPath };

export type Resolution = {
  claims: JsonObject;
  /** Disclosures that filled a placeholder, parents before children. */
  resolved: ResolvedDisclosure[];
  /** Indexed disclosures no reachable placeholder referenced. */
  unused: Disclosure[];
};

/**
 * Replaces every placeholder that has a disclosure in `index` with its value,
 * recursing into disclosed values. Placeholders without a disclosure (withheld
 * claims and decoys) are dropped.
 */
export function resolveClaimTree(root: ObjectNode, index: DigestIndex): Resolution {
  const used = new Set<string>();
  const resolved: ResolvedDisclosure[] = [];

  function take(digest: string, path: ClaimPath): Disclosure | undefined {
    const disclosure = index.get(digest);
    if (!disclosure) return undefined;
    if (used.has(digest)) {
      throw new DuplicateDigestError(`disclosure referenced more than once (at ${formatClaimPath(path)})`);
    }
    used.add(digest);
    return disclosure;
  }

  function disclosed(disclosure: Disclosure, path: ClaimPath): JsonValue {
    resolved.push({ disclosure, path });
    return walk(parseClaimTree(disclosure.value, path), path);
  }

  function walk(node: ClaimNode, path: ClaimPath): JsonValue {
    switch (node.kind) {
      case 'scalar':
        return node.value;
      case 'placeholder':
        throw new EncodingError(`array digest placeholder outside an array at ${formatClaimPath(path)}`);
      case 'array': {
        const out: JsonValue[] = [];
        for (const item of node.items) {
          if (item.kind !== 'placeholder') {
            out.push(walk(item, [...path, out.length]));
            continue;
          }
          const disclosure = take(item.digest, path);
          if (!disclosure) continue;
          if (disclosure.key !== undefined) {
            throw new EncodingError(`claim disclosure "${disclosure.key}" used as an array element at ${formatClaimPath(path)}`);
          }
          out.push(disclosed(disclosure, [...path, out.length]));
        }
        return out;
      }
      case 'object': {
        const out: JsonObject = {};
        for (const [key, child] of node.claims) setOwn(out, key, walk(child, [...path, key]));
        for (const digest of node.digests) {
          const disclosure = take(digest, path);
          if (!disclosure) continue;
          if (disclosure.key === undefined) {
            throw new EncodingError(`array element disclosure referenced from _sd at ${formatClaimPath(path)}`);
          }
          if (hasOwn(out, disclosure.key)) {
            throw new EncodingError(`claim "${disclosure.key}" is disclosed but already present at ${formatClaimPath(path)}`);
          }
          setOwn(out, disclosure.key, disclosed(disclosure, [...path, disclosure.key]));
        }
        return out;
      }
    }
  }

  const claims = walk(root, []);
  if (!isJsonObject(claims)) throw new EncodingError('claim set must be a JSON object');
  const unused = [...index.values()].filter((d) => !used.has(d.digest));
  return { claims, resolved, unused };
}
