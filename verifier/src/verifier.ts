import type { JWK } from 'jose';
import {
  EncodingError,
  ExpiredCredentialError,
  HOLDER_BINDING_TYP,
  HolderBindingError,
  MissingBindingError,
  NotYetValidError,
  SD_ALG_KEY,
  SdJwtError,
  UnknownIssuerError,
  UnresolvedDigestError,
  VerifierConfigSchema,
  buildIndex,
  decodeCompact,
  digestAlgorithmOf,
  isJsonObject,
  isSdJwtError,
  parseClaimTree,
  parseConfig,
  parseDisclosure,
  parseJwk,
  resolveClaimTree,
  silentAudit,
  splitCombined,
  verifyCompact,
  type AuditLog,
  type CompactHeader,
  type Disclosure,
  type JsonObject,
  type VerifierConfig,
} from '@sd-disclose/shared';

/** Must throw (not return nothing) for issuers it does not know. */
export type IssuerKeyResolver = (issuer: string, header: CompactHeader) => JWK | Promise<JWK>;

export type VerifierOptions = {
  config: VerifierConfig;
  resolveIssuerKey: IssuerKeyResolver;
  /** Seconds since the epoch. */
  clock?: () => number;
  audit?: AuditLog;
};

export type VerificationExpectations = {
  nonce?: string;
  audience?: string;
};

export type VerifiedHolderBinding = {
  publicKey: JWK;
  nonce: string;
  audience: string;
  issuedAt: number;
};

export type VerifiedSdJwt = {
  /** Reconstructed claims without `_sd`, `_sd_alg` and `cnf`. */
  claims: JsonObject;
  header: CompactHeader;
  disclosures: Disclosure[];
  holderBinding?: VerifiedHolderBinding;
};

export class SdJwtVerifier {
  private readonly config: VerifierConfig;
  private readonly clock: () => number;
  private readonly audit: AuditLog;

  constructor(private readonly options: VerifierOptions) {
    this.config = parseConfig(VerifierConfigSchema, options.config, 'verifier');
    this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
    this.audit = options.audit ?? silentAudit;
  }

  /** Either returns every disclosed claim, fully checked, or throws; there is no partial result. */
  async verify(presentation: string, expected: VerificationExpectations = {}): Promise<VerifiedSdJwt> {
    try {
      const verified = await this.run(presentation, expected);
      await this.audit.log('sd_jwt_verified', {
        disclosed: verified.disclosures.length,
        holderBinding: verified.holderBinding !== undefined,
      });
      return verified;
    } catch (err) {
      await this.audit.log('verification_failed', { code: isSdJwtError(err) ? err.code : 'internal_error' });
      throw err;
    }
  }

  private async run(presentation: string, expected: VerificationExpectations): Promise<VerifiedSdJwt> {
    const artifact = splitCombined(presentation);

    const unverified = decodeCompact(artifact.jwt);
    const iss = unverified.payload.iss;
    if (typeof iss !== 'string' || iss.length === 0) throw new EncodingError('credential has no "iss" claim');
    const issuerKey = await this.issuerKey(iss, unverified.header);
    const { header, payload } = await verifyCompact(artifact.jwt, {
      key: issuerKey,
      algorithms: this.config.signatureAlgorithms,
    });

    this.checkTemporal(payload);

    const alg = digestAlgorithmOf(payload);
    if (!this.config.digestAlgorithms.includes(alg)) throw new EncodingError(`digest algorithm ${alg} is not accepted`);
    const disclosures = artifact.disclosures.map((d) => parseDisclosure(d, alg));
    const index = buildIndex(disclosures);

    const root = parseClaimTree(payload);
    if (root.kind !== 'object') throw new EncodingError('payload must be a JSON object');
    const { claims, unused } = resolveClaimTree(root, index);
    if (unused.length > 0) {
      throw new UnresolvedDigestError(`${unused.length} presented disclosure(s) match no digest in the credential`);
    }

    const holderBinding = await this.checkHolderBinding(payload, artifact.holderBinding, expected);

    delete claims[SD_ALG_KEY];
    delete claims.cnf;
    return { claims, header, disclosures, ...(holderBinding ? { holderBinding } : {}) };
  }

  private async issuerKey(iss: string, header: CompactHeader): Promise<JWK> {
    let key: JWK | undefined;
    try {
      key = await this.options.resolveIssuerKey(iss, header);
    } catch (err) {
      if (err instanceof UnknownIssuerError) throw err;
      throw new UnknownIssuerError(`no key for issuer ${iss}`, { cause: err });
    }
    if (!key) throw new UnknownIssuerError(`no key for issuer ${iss}`);
    return key;
  }

  private numericDate(payload: JsonObject, name: string): number | undefined {
    const value = payload[name];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isFinite(value)) throw new EncodingError(`"${name}" must be a NumericDate`);
    return value;
  }

  private checkTemporal(payload: JsonObject) {
    const now = this.clock();
    const skew = this.config.clockToleranceSeconds;
    const exp = this.numericDate(payload, 'exp');
    const nbf = this.numericDate(payload, 'nbf');
    const iat = this.numericDate(payload, 'iat');
    if (exp !== undefined && now - skew >= exp) throw new ExpiredCredentialError('credential has expired');
    if (nbf !== undefined && now + skew < nbf) throw new NotYetValidError('credential is not valid yet');
    if (iat !== undefined && now + skew < iat) throw new NotYetValidError('credential was issued in the future');
  }

  private async checkHolderBinding(
    payload: JsonObject,
    token: string | undefined,
    expected: VerificationExpectations,
  ): Promise<VerifiedHolderBinding | undefined> {
    const cnf = payload.cnf;
    if (!token) {
      if (this.config.requireHolderBinding || cnf !== undefined) {
        throw new MissingBindingError('presentation carries no holder binding');
      }
      return undefined;
    }
    const bound = isJsonObject(cnf) ? parseJwk(cnf.jwk) : undefined;
    if (!bound) throw new HolderBindingError('credential has no cnf.jwk to check the holder binding against');
    const { nonce: expectedNonce, audience: expectedAudience } = expected;
    if (expectedNonce === undefined || expectedAudience === undefined) {
      throw new HolderBindingError('expected nonce and audience are required to check a holder binding');
    }

    let verified: Awaited<ReturnType<typeof verifyCompact>>;
    try {
      verified = await verifyCompact(token, { key: bound, algorithms: this.config.signatureAlgorithms });
    } catch (err) {
      if (err instanceof SdJwtError) throw new HolderBindingError('holder binding signature is invalid', { cause: err });
      throw err;
    }
    if (verified.header.typ !== HOLDER_BINDING_TYP) {
      throw new HolderBindingError(`holder binding typ must be ${HOLDER_BINDING_TYP}`);
    }

    const { nonce, aud, iat } = verified.payload;
    if (typeof nonce !== 'string' || nonce !== expectedNonce) throw new HolderBindingError('holder binding nonce does not match');
    if (typeof aud !== 'string' || aud !== expectedAudience) throw new HolderBindingError('holder binding audience does not match');
    if (typeof iat !== 'number') throw new HolderBindingError('holder binding has no iat');
    const now = this.clock();
    const skew = this.config.clockToleranceSeconds;
    if (iat > now + skew) throw new HolderBindingError('holder binding was issued in the future');
    if (now - iat > this.config.holderBindingMaxAgeSeconds + skew) throw new HolderBindingError('holder binding is too old');

    return { publicKey: bound, nonce, audience: aud, issuedAt: iat };
  }
}
