import { describe, it, expect } from 'vitest';
import {
  DuplicateDigestError,
  EncodingError,
  buildIndex,
  claimTreeToJson,
  formatClaimPath,
  makeDisclosure,
  parseClaimTree,
  resolveClaimTree,
  type JsonObject,
  type ObjectNode,
} from '../src/index.js';

function objectTree(payload: JsonObject): ObjectNode {
  const node = parseClaimTree(payload);
  if (node.kind !== 'object') throw new Error('expected an object node');
  return node;
}

describe('claim tree', () => {
  it('parses placeholders and serializes back to the same JSON', () => {
    const payload = { iss: 'x', _sd: ['d1', 'd2'], list: [{ '...': 'd3' }, 2], nested: { a: null } };
    const node = objectTree(payload);
    expect(node.digests).toEqual(['d1', 'd2']);
    expect(node.claims.get('list')).toEqual({
      kind: 'array',
      items: [{ kind: 'placeholder', digest: 'd3' }, { kind: 'scalar', value: 2 }],
    });
    expect(claimTreeToJson(node)).toEqual(payload);
  });

  it.each<[string, JsonObject]>([
    ['a "..." key outside an array', { '...': 'd1' }],
    ['a placeholder with extra members', { list: [{ '...': 'd1', extra: 1 }] }],
    ['a non-string placeholder', { list: [{ '...': 1 }] }],
    ['a non-array _sd', { _sd: 'd1' }],
    ['a non-string _sd entry', { _sd: [1] }],
  ])('rejects %s', (_what, payload) => {
    expect(() => parseClaimTree(payload)).toThrow(EncodingError);
  });

  it('rejects an _sd list that repeats a digest', () => {
    expect(() => parseClaimTree({ _sd: ['d1', 'd1'] })).toThrow(DuplicateDigestError);
  });
});

describe('resolveClaimTree', () => {
  const givenName = makeDisclosure('s1', 'given_name', 'Alice', 'sha-256');
  const second = makeDisclosure('s2', undefined, 'BB', 'sha-256');

  it('fills disclosed placeholders and drops withheld ones', () => {
    const root = objectTree({
      iss: 'https://issuer.example.test',
      _sd: [givenName.digest, 'withheld-or-decoy'],
      nationalities: ['AA', { '...': second.digest }, { '...': 'withheld' }],
    });
    const { claims, resolved, unused } = resolveClaimTree(root, buildIndex([givenName, second]));
    expect(claims).toEqual({ iss: 'https://issuer.example.test', given_name: 'Alice', nationalities: ['AA', 'BB'] });
    expect(resolved.map((r) => formatClaimPath(r.path))).toEqual(['nationalities.1', 'given_name']);
    expect(unused).toEqual([]);
  });

  it('numbers array paths by their position in the output', () => {
    const root = objectTree({ list: [{ '...': 'decoy' }, { '...': second.digest }] });
    const { claims, resolved } = resolveClaimTree(root, buildIndex([second]));
    expect(claims).toEqual({ list: ['BB'] });
    expect(resolved[0]?.path).toEqual(['list', 0]);
  });

  it('resolves disclosures nested in disclosed values, parents first', () => {
    const street = makeDisclosure('s3', 'street', 'Main', 'sha-256');
    const address = makeDisclosure('s4', 'address', { _sd: [street.digest], country: 'ZZ' }, 'sha-256');
    const { claims, resolved } = resolveClaimTree(objectTree({ _sd: [address.digest] }), buildIndex([street, address]));
    expect(claims).toEqual({ address: { country: 'ZZ', street: 'Main' } });
    expect(resolved.map((r) => formatClaimPath(r.path))).toEqual(['address', 'address.street']);
  });

  it('reports disclosures nothing references', () => {
    const extra = makeDisclosure('s5', 'extra', true, 'sha-256');
    const { claims, unused } = resolveClaimTree(objectTree({ _sd: [givenName.digest] }), buildIndex([givenName, extra]));
    expect(claims).toEqual({ given_name: 'Alice' });
    expect(unused).toEqual([extra]);
  });

  it('rejects a disclosure referenced from two places', () => {
    const root = objectTree({ _sd: [givenName.digest], other: { _sd: [givenName.digest] } });
    expect(() => resolveClaimTree(root, buildIndex([givenName]))).toThrow(DuplicateDigestError);
  });

  it('rejects a claim disclosure in an array slot and an element disclosure in _sd', () => {
    expect(() => resolveClaimTree(objectTree({ list: [{ '...': givenName.digest }] }), buildIndex([givenName]))).toThrow(
      EncodingError,
    );
    expect(() => resolveClaimTree(objectTree({ _sd: [second.digest] }), buildIndex([second]))).toThrow(EncodingError);
  });

  it('rejects a disclosure that overwrites a plain claim', () => {
    const root = objectTree({ given_name: 'Bob', _sd: [givenName.digest] });
    expect(() => resolveClaimTree(root, buildIndex([givenName]))).toThrow(EncodingError);
  });

  it('keeps "__proto__" as an ordinary claim', () => {
    const proto = makeDisclosure('s6', '__proto__', { polluted: true }, 'sha-256');
    const { claims } = resolveClaimTree(objectTree({ _sd: [proto.digest] }), buildIndex([proto]));
    expect(Object.prototype.hasOwnProperty.call(claims, '__proto__')).toBe(true);
    expect(Object.getPrototypeOf(claims)).toBe(Object.prototype);
  });
});
