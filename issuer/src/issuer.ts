import type { JWK } from 'jose';
import {
  ARRAY_DIGEST_KEY,
  ConfigError,
  IssuerConfigSchema,
  PolicyError,
  SD_ALG_KEY,
  SD_DIGESTS_KEY,
  decoyDigest,
  generateSalt,
  hasOwn,
  isJsonObject,
  isJsonValue,
  isPrivateJwk,
  joinCombined,
  makeDisclosure,
  objectNodeToJson,
  claimTreeToJson,
  parseConfig,
  signCompact,
  silentAudit,
  systemRandom,
  toPublicJwk,
  formatClaimPath,
  type AuditLog,
  type ClaimNode,
  type ClaimPath,
  type CompactHeader,
  type Disclosure,
  type DisclosurePolicy,
  type IssuerConfig,
  type JsonObject,
  type JsonValue,
  type ObjectNode,
  type RandomSource,
} from '@sd-disclose/shared';
import { decoyPolicyFromConfig, type DecoyPolicy } from './decoys.js';
import { compileDisclosurePolicy, type ClaimSelector } from './policy.js';

export type IssuerOptions = {
  config: IssuerConfig;
  /** Private JWK used for the issuer signature. */
  signingKey: JWK;
  /** Overrides the decoy policy built from `config.decoys`. */
  decoyPolicy?: DecoyPolicy;
  random?: RandomSource;
  audit?: AuditLog;
};

export type IssueRequest = {
  claims: JsonObject;
  /** Binds the credential to this holder key (`cnf.jwk`). */
  holderPublicKey?: JWK;
  /** Per-credential override of `config.disclosurePolicy`. */
  disclosurePolicy?: DisclosurePolicy;
  /** Sets `iat` when the claim set has none. */
  issuedAt?: number;
  /** Sets `exp` relative to `iat` when the claim set has none. */
  expiresInSeconds?: number;
};

export type IssuedSdJwt = {
  combined: string;
  jwt: string;
  header: CompactHeader;
  payload: JsonObject;
  /** Generation order: nested disclosures precede the ones containing them. */
  disclosures: Disclosure[];
  decoyDigests: string[];
};

const ISSUER_MANAGED_CLAIMS = [SD_ALG_KEY, 'cnf'];

export class SdJwtIssuer {
  private readonly config: IssuerConfig;
  private readonly decoys: DecoyPolicy;
  private readonly random: RandomSource;
  private readonly audit: AuditLog;

  constructor(private readonly options: IssuerOptions) {
    this.config = parseConfig(IssuerConfigSchema, options.config, 'issuer');
    if (!isPrivateJwk(options.signingKey)) throw new ConfigError('issuer signing key must be a private JWK');
    this.decoys = options.decoyPolicy ?? decoyPolicyFromConfig(this.config.decoys);
    this.random = options.random ?? systemRandom;
    this.audit = options.audit ?? silentAudit;
  }

  async issue(request: IssueRequest): Promise<IssuedSdJwt> {
    const { claims, holderPublicKey } = request;
    if (!isJsonObject(claims) || !isJsonValue(claims)) throw new PolicyError('claim set must be a JSON object');
    if (typeof claims.iss !== 'string' || claims.iss.length === 0) throw new PolicyError('claim set needs a string "iss"');
    for (const name of ISSUER_MANAGED_CLAIMS) {
      if (hasOwn(claims, name)) throw new PolicyError(`claim "${name}" is set by the issuer`);
    }
    if (holderPublicKey && isPrivateJwk(holderPublicKey)) throw new PolicyError('holder binding key must be public');

    const select = compileDisclosurePolicy(request.disclosurePolicy ?? this.config.disclosurePolicy, claims);
    const build = new PayloadBuilder(select, this.decoys, this.random, this.config.digestAlgorithm);
    const payload = objectNodeToJson(build.object(claims, []));

    const iat = typeof claims.iat === 'number' ? claims.iat : request.issuedAt ?? Math.floor(Date.now() / 1000);
    if (request.issuedAt !== undefined && !hasOwn(claims, 'iat')) payload.iat = request.issuedAt;
    if (request.expiresInSeconds !== undefined && !hasOwn(claims, 'exp')) payload.exp = iat + request.expiresInSeconds;
    payload[SD_ALG_KEY] = this.config.digestAlgorithm;
    if (holderPublicKey) payload.cnf = { jwk: jwkToJson(toPublicJwk(holderPublicKey)) };

    const jwt = await signCompact(payload, {
      key: this.options.signingKey,
      alg: this.config.signatureAlgorithm,
      typ: this.config.typ,
    });
    const combined = joinCombined({ jwt, disclosures: build.disclosures.map((d) => d.encoded) });

    await this.audit.log('sd_jwt_issued', {
      iss: claims.iss,
      disclosures: build.disclosures.length,
      decoys: build.decoyDigests.length,
      digestAlgorithm: this.config.digestAlgorithm,
      holderBinding: holderPublicKey !== undefined,
    });

    const header: CompactHeader = { alg: this.config.signatureAlgorithm, typ: this.config.typ };
    if (this.options.signingKey.kid) header.kid = this.options.signingKey.kid;
    return { combined, jwt, header, payload, disclosures: build.disclosures, decoyDigests: build.decoyDigests };
  }
}

function jwkToJson(jwk: JWK): JsonObject {
  const value: unknown = jwk;
  if (!isJsonObject(value) || !isJsonValue(value)) throw new PolicyError('holder binding key is not a JSON JWK');
  return value;
}

/** One issuance: walks the claims depth-first, children before parents. */
class PayloadBuilder {
  readonly disclosures: Disclosure[] = [];
  readonly decoyDigests: string[] = [];

  constructor(
    private readonly select: ClaimSelector,
    private readonly decoys: DecoyPolicy,
    private readonly random: RandomSource,
    private readonly alg: IssuerConfig['digestAlgorithm'],
  ) {}

  private node(value: JsonValue, path: ClaimPath): ClaimNode {
    if (Array.isArray(value)) return this.array(value, path);
    if (isJsonObject(value)) return this.object(value, path);
    return { kind: 'scalar', value };
  }

  private disclose(key: string | undefined, child: ClaimNode): string {
    const disclosure = makeDisclosure(generateSalt(this.random), key, claimTreeToJson(child), this.alg);
    this.disclosures.push(disclosure);
    return disclosure.digest;
  }

  private decoy(): string {
    const digest = decoyDigest(this.random, this.alg);
    this.decoyDigests.push(digest);
    return digest;
  }

  object(value: JsonObject, path: ClaimPath): ObjectNode {
    const claims = new Map<string, ClaimNode>();
    const digests: string[] = [];
    for (const [key, raw] of Object.entries(value)) {
      if (key === SD_DIGESTS_KEY || key === ARRAY_DIGEST_KEY) {
        throw new PolicyError(`claim name "${key}" is reserved (at ${formatClaimPath(path)})`);
      }
      const at = [...path, key];
      const child = this.node(raw, at);
      if (this.select(at)) digests.push(this.disclose(key, child));
      else claims.set(key, child);
    }
    if (digests.length > 0 || path.length === 0) {
      const n = this.decoys.count({ container: 'object', path, disclosable: digests.length }, this.random);
      for (let i = 0; i < n; i++) digests.push(this.decoy());
    }
    // sorted so the list order says nothing about claim order
    digests.sort();
    return { kind: 'object', claims, digests };
  }

  private array(value: JsonValue[], path: ClaimPath): ClaimNode {
    const items: ClaimNode[] = [];
    let disclosable = 0;
    value.forEach((raw, i) => {
      const at = [...path, i];
      const child = this.node(raw, at);
      if (this.select(at)) {
        items.push({ kind: 'placeholder', digest: this.disclose(undefined, child) });
        disclosable++;
      } else {
        items.push(child);
      }
    });
    if (disclosable > 0) {
      const n = this.decoys.count({ container: 'array', path, disclosable }, this.random);
      for (let i = 0; i < n; i++) {
        const at = this.decoys.arrayInsertIndex(items.length, this.random);
        items.splice(Math.min(Math.max(at, 0), items.length), 0, { kind: 'placeholder', digest: this.decoy() });
      }
    }
    return { kind: 'array', items };
  }
}
