import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DuplicateDigestError,
  EncodingError,
  ExpiredCredentialError,
  HolderBindingError,
  InvalidSignatureError,
  MissingBindingError,
  NotYetValidError,
  UnknownIssuerError,
  UnresolvedDigestError,
  decodeCompact,
  deriveEd25519KeyPair,
  joinCombined,
  makeDisclosure,
  seededRandom,
  signCompact,
  splitCombined,
  toPrivateJwkEd25519,
  toPublicJwkEd25519,
  type IssuerConfig,
  type JsonObject,
  type VerifierConfig,
} from '@sd-disclose/shared';
import { SdJwtIssuer, type IssueRequest } from '@sd-disclose/issuer';
import { SdJwtHolder, type DisclosureSelection } from '@sd-disclose/holder';
import { SdJwtVerifier, type IssuerKeyResolver } from '../src/index.js';

const ISS = 'https://issuer.example.test';
const AUD = 'https://verifier.example.test';
const NOW = 1_700_000_100;
const issuerKeys = deriveEd25519KeyPair('verifier-suite-issuer');
const holderKeys = deriveEd25519KeyPair('verifier-suite-holder');
const strangerKeys = deriveEd25519KeyPair('verifier-suite-stranger');
const issuerPublicKey = toPublicJwkEd25519(issuerKeys.publicKey);
const holderPublicKey = toPublicJwkEd25519(holderKeys.publicKey);
const holderPrivateKey = toPrivateJwkEd25519(holderKeys.privateKey);

const baseVerifierConfig: VerifierConfig = {
  signatureAlgorithms: ['EdDSA'],
  digestAlgorithms: ['sha-256'],
  requireHolderBinding: false,
  clockToleranceSeconds: 0,
  holderBindingMaxAgeSeconds: 300,
};

async function issue(request: IssueRequest, config: Partial<IssuerConfig> = {}) {
  const issuer = new SdJwtIssuer({
    config: {
      digestAlgorithm: 'sha-256',
      signatureAlgorithm: 'EdDSA',
      disclosurePolicy: { kind: 'top-level' },
      decoys: { mode: 'none' },
      typ: 'vc+sd-jwt',
      ...config,
    },
    signingKey: toPrivateJwkEd25519(issuerKeys.privateKey),
    random: seededRandom('verifier-suite'),
  });
  return issuer.issue(request);
}

const holder = new SdJwtHolder({
  config: { signatureAlgorithm: 'EdDSA', onUnmatchedSelection: 'error' },
  clock: () => NOW,
});

async function present(combined: string, selection: DisclosureSelection, bind = false) {
  const binding = bind ? { nonce: 'test-nonce', audience: AUD, holderKey: holderPrivateKey } : undefined;
  return (await holder.present(combined, selection, binding)).combined;
}

const knownIssuer: IssuerKeyResolver = (iss) => {
  if (iss !== ISS) throw new Error(`unknown issuer ${iss}`);
  return issuerPublicKey;
};

function makeVerifier(
  overrides: Partial<VerifierConfig> = {},
  opts: { clock?: () => number; resolve?: IssuerKeyResolver; events?: string[] } = {},
) {
  const events = opts.events ?? [];
  return new SdJwtVerifier({
    config: { ...baseVerifierConfig, ...overrides },
    resolveIssuerKey: opts.resolve ?? knownIssuer,
    clock: opts.clock ?? (() => NOW),
    audit: { log: async (event) => void events.push(event) },
  });
}

const fullClaims: JsonObject = {
  iss: ISS,
  iat: 1_700_000_000,
  given_name: 'Alice',
  address: { street: 'Main', city: 'Town' },
  nationalities: ['AA', 'BB', 'CC'],
};

describe('SdJwtVerifier', () => {
  it('returns exactly the disclosed claims', async () => {
    const issued = await issue({ claims: { iss: ISS, given_name: 'Alice', family_name: 'Example' } });
    const events: string[] = [];
    const verified = await makeVerifier({}, { events }).verify(
      await present(issued.combined, { kind: 'paths', paths: ['given_name'] }),
    );
    expect(verified.claims).toEqual({ iss: ISS, given_name: 'Alice' });
    expect(verified.header).toEqual({ alg: 'EdDSA', typ: 'vc+sd-jwt' });
    expect(verified.disclosures).toHaveLength(1);
    expect(verified.holderBinding).toBeUndefined();
    expect(events).toEqual(['sd_jwt_verified']);
  });

  it('reconstructs the full claim set through nesting, arrays and decoys', async () => {
    const issued = await issue(
      { claims: fullClaims },
      { disclosurePolicy: { kind: 'recursive' }, decoys: { mode: 'fixed', object: 2, array: 2 } },
    );
    const verified = await makeVerifier().verify(await present(issued.combined, { kind: 'all' }));
    expect(verified.claims).toEqual(fullClaims);
  });

  it('keeps the order of the array elements it reveals', async () => {
    const issued = await issue(
      { claims: fullClaims },
      { disclosurePolicy: { kind: 'recursive' }, decoys: { mode: 'fixed', object: 1, array: 3 } },
    );
    const verified = await makeVerifier().verify(
      await present(issued.combined, { kind: 'paths', paths: ['nationalities.0', 'nationalities.2'] }),
    );
    expect(verified.claims).toEqual({ iss: ISS, iat: 1_700_000_000, nationalities: ['AA', 'CC'] });
  });

  it('reconstructs the same claims whatever the disclosure order', async () => {
    const issued = await issue(
      { claims: fullClaims },
      { disclosurePolicy: { kind: 'recursive' }, decoys: { mode: 'fixed', object: 1, array: 2 } },
    );
    const { jwt, disclosures } = splitCombined(await present(issued.combined, { kind: 'all' }));
    const reversed = joinCombined({ jwt, disclosures: [...disclosures].reverse() });
    const rotated = joinCombined({ jwt, disclosures: [...disclosures.slice(2), ...disclosures.slice(0, 2)] });
    for (const presentation of [reversed, rotated]) {
      const verified = await makeVerifier().verify(presentation);
      expect(verified.claims).toEqual(fullClaims);
      expect(verified.claims.nationalities).toEqual(['AA', 'BB', 'CC']);
    }
  });

  it('accepts a presentation with nothing disclosed', async () => {
    const issued = await issue({ claims: fullClaims }, { decoys: { mode: 'fixed', object: 2, array: 0 } });
    const verified = await makeVerifier().verify(await present(issued.combined, { kind: 'none' }));
    expect(verified.claims).toEqual({ iss: ISS, iat: 1_700_000_000 });
  });

  describe('issuer signature', () => {
    it('rejects a credential checked against another key', async () => {
      const issued = await issue({ claims: { iss: ISS, given_name: 'Alice' } });
      const verifier = makeVerifier({}, { resolve: () => toPublicJwkEd25519(strangerKeys.publicKey) });
      await expect(verifier.verify(await present(issued.combined, { kind: 'all' }))).rejects.toThrow(InvalidSignatureError);
    });

    it('rejects a modified payload', async () => {
      const issued = await issue({ claims: { iss: ISS, given_name: 'Alice' } });
      const [header, , signature] = issued.jwt.split('.');
      const payload = { ...decodeCompact(issued.jwt).payload, family_name: 'Mallory' };
      const forged = `${header}.${Buffer.from(JSON.stringify(payload)).toString('base64url')}.${signature}`;
      await expect(makeVerifier().verify(`${forged}~`)).rejects.toThrow(InvalidSignatureError);
    });

    it('wraps resolver failures as unknown issuer', async () => {
      const issued = await issue({ claims: { iss: ISS } });
      const cause = new Error('not in the trust list');
      const verifier = makeVerifier({}, { resolve: () => { throw cause; } });
      const err: unknown = await verifier.verify(issued.combined).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(UnknownIssuerError);
      expect(err instanceof Error ? err.cause : undefined).toBe(cause);
    });

    it('needs an iss claim to look up the key', async () => {
      const jwt = await signCompact({ given_name: 'Alice' }, { key: toPrivateJwkEd25519(issuerKeys.privateKey), alg: 'EdDSA' });
      await expect(makeVerifier().verify(`${jwt}~`)).rejects.toThrow('credential has no "iss" claim');
    });

    it('rejects a digest algorithm it does not accept', async () => {
      const issued = await issue({ claims: { iss: ISS, given_name: 'Alice' } }, { digestAlgorithm: 'sha-512' });
      await expect(makeVerifier().verify(issued.combined)).rejects.toThrow('digest algorithm sha-512 is not accepted');
      const verified = await makeVerifier({ digestAlgorithms: ['sha-256', 'sha-512'] }).verify(issued.combined);
      expect(verified.claims).toEqual({ iss: ISS, given_name: 'Alice' });
    });
  });

  describe('disclosures', () => {
    it('rejects a disclosure the issuer never signed for', async () => {
      const issued = await issue({ claims: { iss: ISS, given_name: 'Alice' } });
      const forged = makeDisclosure('forged-salt', 'given_name', 'Mallory', 'sha-256');
      const events: string[] = [];
      await expect(
        makeVerifier({}, { events }).verify(joinCombined({ jwt: issued.jwt, disclosures: [forged.encoded] })),
      ).rejects.toThrow(UnresolvedDigestError);
      expect(events).toEqual(['verification_failed']);
    });

    it('rejects an edited disclosure value', async () => {
      const issued = await issue({ claims: { iss: ISS, given_name: 'Alice' } });
      const [original] = issued.disclosures;
      const edited = makeDisclosure(original?.salt ?? '', original?.key, 'Mallory', 'sha-256');
      await expect(
        makeVerifier().verify(joinCombined({ jwt: issued.jwt, disclosures: [edited.encoded] })),
      ).rejects.toThrow(UnresolvedDigestError);
    });

    it('rejects the same disclosure sent twice', async () => {
      const issued = await issue({ claims: { iss: ISS, given_name: 'Alice' } });
      const encoded = issued.disclosures[0]?.encoded ?? '';
      await expect(
        makeVerifier().verify(joinCombined({ jwt: issued.jwt, disclosures: [encoded, encoded] })),
      ).rejects.toThrow(DuplicateDigestError);
    });

    it('rejects a malformed artifact', async () => {
      await expect(makeVerifier().verify('garbage')).rejects.toThrow(EncodingError);
    });
  });

  describe('validity period', () => {
    it('rejects an expired credential unless within tolerance', async () => {
      const issued = await issue({ claims: { iss: ISS }, issuedAt: 1_700_000_000, expiresInSeconds: 60 });
      await expect(makeVerifier().verify(issued.combined)).rejects.toThrow(ExpiredCredentialError);
      const verified = await makeVerifier({ clockToleranceSeconds: 60 }).verify(issued.combined);
      expect(verified.claims).toEqual({ iss: ISS, iat: 1_700_000_000, exp: 1_700_000_060 });
    });

    it('rejects a credential before nbf or issued in the future', async () => {
      const early = await issue({ claims: { iss: ISS, nbf: 1_800_000_000 } });
      await expect(makeVerifier().verify(early.combined)).rejects.toThrow(NotYetValidError);
      const future = await issue({ claims: { iss: ISS }, issuedAt: 1_800_000_000 });
      await expect(makeVerifier().verify(future.combined)).rejects.toThrow('credential was issued in the future');
    });

    it('rejects time claims that are not numbers', async () => {
      const issued = await issue({ claims: { iss: ISS, exp: 'soon' } });
      await expect(makeVerifier().verify(issued.combined)).rejects.toThrow('"exp" must be a NumericDate');
    });
  });

  describe('holder binding', () => {
    const expected = { nonce: 'test-nonce', audience: AUD };

    async function boundIssuance() {
      return issue({ claims: { iss: ISS, given_name: 'Alice' }, holderPublicKey });
    }

    it('verifies a binding for the expected nonce and audience', async () => {
      const issued = await boundIssuance();
      const verified = await makeVerifier({ requireHolderBinding: true }).verify(
        await present(issued.combined, { kind: 'all' }, true),
        expected,
      );
      expect(verified.claims).toEqual({ iss: ISS, given_name: 'Alice' });
      expect(verified.holderBinding).toEqual({ publicKey: holderPublicKey, nonce: 'test-nonce', audience: AUD, issuedAt: NOW });
    });

    it.each([
      ['another nonce', { nonce: 'other-nonce', audience: AUD }, 'holder binding nonce does not match'],
      ['another audience', { nonce: 'test-nonce', audience: 'https://elsewhere.example.test' }, 'holder binding audience does not match'],
      ['no expectations', {}, 'expected nonce and audience are required'],
    ])('rejects a binding checked against %s', async (_what, expectation, message) => {
      const issued = await boundIssuance();
      const presentation = await present(issued.combined, { kind: 'all' }, true);
      await expect(makeVerifier().verify(presentation, expectation)).rejects.toThrow(message);
    });

    it('rejects a binding signed with another key', async () => {
      const issued = await boundIssuance();
      const forged = await signCompact(
        { nonce: 'test-nonce', aud: AUD, iat: NOW },
        { key: toPrivateJwkEd25519(strangerKeys.privateKey), alg: 'EdDSA', typ: 'kb+jwt' },
      );
      const presentation = joinCombined({ jwt: issued.jwt, disclosures: [], holderBinding: forged });
      const err: unknown = await makeVerifier().verify(presentation, expected).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(HolderBindingError);
      expect(err instanceof Error ? err.cause : undefined).toBeInstanceOf(InvalidSignatureError);
    });

    it.each<[string, string | undefined]>([
      ['the wrong typ', 'JWT'],
      ['no typ', undefined],
    ])('rejects a binding with %s', async (_what, typ) => {
      const issued = await boundIssuance();
      const binding = await signCompact({ nonce: 'test-nonce', aud: AUD, iat: NOW }, { key: holderPrivateKey, alg: 'EdDSA', typ });
      const presentation = joinCombined({ jwt: issued.jwt, disclosures: [], holderBinding: binding });
      await expect(makeVerifier().verify(presentation, expected)).rejects.toThrow('holder binding typ must be kb+jwt');
    });

    it('rejects stale and future bindings', async () => {
      const issued = await boundIssuance();
      const presentation = await present(issued.combined, { kind: 'none' }, true);
      await expect(makeVerifier({}, { clock: () => NOW + 301 }).verify(presentation, expected)).rejects.toThrow(
        'holder binding is too old',
      );
      await expect(makeVerifier({}, { clock: () => NOW - 10 }).verify(presentation, expected)).rejects.toThrow(
        'holder binding was issued in the future',
      );
      const verified = await makeVerifier({ clockToleranceSeconds: 10 }, { clock: () => NOW - 10 }).verify(presentation, expected);
      expect(verified.holderBinding?.issuedAt).toBe(NOW);
    });

    it('rejects a binding on a credential without cnf', async () => {
      const issued = await issue({ claims: { iss: ISS, given_name: 'Alice' } });
      const binding = await signCompact({ nonce: 'test-nonce', aud: AUD, iat: NOW }, { key: holderPrivateKey, alg: 'EdDSA', typ: 'kb+jwt' });
      const presentation = joinCombined({ jwt: issued.jwt, disclosures: [], holderBinding: binding });
      await expect(makeVerifier().verify(presentation, expected)).rejects.toThrow(HolderBindingError);
    });

    it('requires a binding for a holder-bound credential', async () => {
      const issued = await boundIssuance();
      const stripped = joinCombined({ jwt: issued.jwt, disclosures: issued.disclosures.map((d) => d.encoded) });
      await expect(makeVerifier().verify(stripped, expected)).rejects.toThrow(MissingBindingError);
      await expect(makeVerifier().verify(stripped)).rejects.toThrow('presentation carries no holder binding');
    });

    it('requires a binding on an unbound credential only when configured to', async () => {
      const issued = await issue({ claims: { iss: ISS, given_name: 'Alice' } });
      const unbound = await present(issued.combined, { kind: 'all' });
      await expect(makeVerifier({ requireHolderBinding: true }).verify(unbound, expected)).rejects.toThrow(MissingBindingError);
      const verified = await makeVerifier().verify(unbound, expected);
      expect(verified.claims).toEqual({ iss: ISS, given_name: 'Alice' });
      expect(verified.holderBinding).toBeUndefined();
    });
  });

  it('validates its configuration', () => {
    expect(() => makeVerifier({ signatureAlgorithms: [] })).toThrow(ConfigError);
    expect(() => makeVerifier({ holderBindingMaxAgeSeconds: 0 })).toThrow(ConfigError);
  });
});
