import type { JWK } from 'jose';
import {
  EncodingError,
  HOLDER_BINDING_TYP,
  HolderConfigSchema,
  MissingBindingKeyError,
  UnknownClaimSelectedError,
  buildIndex,
  decodeCompact,
  digestAlgorithmOf,
  formatClaimPath,
  getAtPath,
  isJsonObject,
  isPathPrefix,
  jwkThumbprintSha256,
  joinCombined,
  parseClaimPath,
  parseClaimTree,
  parseConfig,
  parseDisclosure,
  parseJwk,
  resolveClaimTree,
  signCompact,
  silentAudit,
  splitCombined,
  toPublicJwk,
  type AuditLog,
  type ClaimPath,
  type CompactHeader,
  type DigestAlgorithm,
  type Disclosure,
  type HolderConfig,
  type JsonObject,
  type JsonValue,
  type ResolvedDisclosure,
} from '@sd-disclose/shared';

export type HolderOptions = {
  config: HolderConfig;
  /** Seconds since the epoch, used for the binding's `iat`. */
  clock?: () => number;
  audit?: AuditLog;
};

export type ParsedIssuance = {
  jwt: string;
  header: CompactHeader;
  payload: JsonObject;
  digestAlgorithm: DigestAlgorithm;
  /** Issuance order. */
  disclosures: Disclosure[];
  /** `cnf.jwk` when the credential is bound to a holder key. */
  bindingKey?: JWK;
};

export type DisclosableClaim = {
  path: ClaimPath;
  /** Absent for array elements. */
  key?: string;
  value: JsonValue;
  digest: string;
};

export type DisclosureSelection =
  | { kind: 'all' }
  | { kind: 'none' }
  | { kind: 'paths'; paths: readonly (string | ClaimPath)[] };

export type HolderBindingRequest = {
  nonce: string;
  audience: string;
  /** Private JWK matching the credential's `cnf.jwk`. */
  holderKey: JWK;
};

export type Presentation = {
  combined: string;
  /** Revealed disclosures, in issuance order. */
  disclosures: Disclosure[];
  holderBindingJwt?: string;
  holderBindingPayload?: JsonObject;
  warnings: string[];
};

export class SdJwtHolder {
  private readonly config: HolderConfig;
  private readonly clock: () => number;
  private readonly audit: AuditLog;

  constructor(options: HolderOptions) {
    this.config = parseConfig(HolderConfigSchema, options.config, 'holder');
    this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
    this.audit = options.audit ?? silentAudit;
  }

  /** Splits an issuance artifact. The issuer signature is left to the verifier. */
  parse(issuance: string): ParsedIssuance {
    const artifact = splitCombined(issuance);
    if (artifact.holderBinding) throw new EncodingError('issuance artifact already carries a holder binding');
    const { header, payload } = decodeCompact(artifact.jwt);
    const digestAlgorithm = digestAlgorithmOf(payload);
    const disclosures = artifact.disclosures.map((d) => parseDisclosure(d, digestAlgorithm));

    const cnf = payload.cnf;
    let bindingKey: JWK | undefined;
    if (cnf !== undefined) {
      bindingKey = isJsonObject(cnf) ? parseJwk(cnf.jwk) : undefined;
      if (!bindingKey) throw new EncodingError('cnf does not carry a usable jwk');
    }
    return { jwt: artifact.jwt, header, payload, digestAlgorithm, disclosures, bindingKey };
  }

  /** Every disclosure with the claim path it fills; decoys are not listed. */
  listDisclosures(issuance: string | ParsedIssuance): DisclosableClaim[] {
    const parsed = typeof issuance === 'string' ? this.parse(issuance) : issuance;
    return this.resolve(parsed).resolved.map(({ disclosure, path }) => ({
      path,
      ...(disclosure.key === undefined ? {} : { key: disclosure.key }),
      value: disclosure.value,
      digest: disclosure.digest,
    }));
  }

  async present(
    issuance: string | ParsedIssuance,
    selection: DisclosureSelection,
    binding?: HolderBindingRequest,
  ): Promise<Presentation> {
    const parsed = typeof issuance === 'string' ? this.parse(issuance) : issuance;
    const warnings: string[] = [];
    const selected = this.select(parsed, selection, warnings);
    const disclosures = parsed.disclosures.filter((d) => selected.has(d.digest));

    let holderBindingJwt: string | undefined;
    let holderBindingPayload: JsonObject | undefined;
    if (parsed.bindingKey) {
      if (!binding) throw new MissingBindingKeyError('credential is holder-bound; a holder key, nonce and audience are required');
      await assertSameKey(binding.holderKey, parsed.bindingKey);
      holderBindingPayload = { nonce: binding.nonce, aud: binding.audience, iat: this.clock() };
      holderBindingJwt = await signCompact(holderBindingPayload, {
        key: binding.holderKey,
        alg: this.config.signatureAlgorithm,
        typ: HOLDER_BINDING_TYP,
      });
    } else if (binding) {
      warnings.push('credential carries no cnf key; holder binding was not added');
    }

    await this.audit.log('presentation_created', {
      disclosed: disclosures.length,
      withheld: parsed.disclosures.length - disclosures.length,
      holderBinding: holderBindingJwt !== undefined,
    });
    return {
      combined: joinCombined({ jwt: parsed.jwt, disclosures: disclosures.map((d) => d.encoded), holderBinding: holderBindingJwt }),
      disclosures,
      holderBindingJwt,
      holderBindingPayload,
      warnings,
    };
  }

  private resolve(parsed: ParsedIssuance) {
    const root = parseClaimTree(parsed.payload);
    if (root.kind !== 'object') throw new EncodingError('payload must be a JSON object');
    const resolution = resolveClaimTree(root, buildIndex(parsed.disclosures));
    if (resolution.unused.length > 0) {
      throw new EncodingError(`${resolution.unused.length} disclosure(s) match no placeholder in the payload`);
    }
    return resolution;
  }

  /**
   * Digests to reveal. A path reveals the claim there with its whole subtree and
   * every disclosable claim enclosing it.
   */
  private select(parsed: ParsedIssuance, selection: DisclosureSelection, warnings: string[]): Set<string> {
    if (selection.kind === 'none') return new Set();
    const { claims, resolved } = this.resolve(parsed);
    if (selection.kind === 'all') return new Set(resolved.map((r) => r.disclosure.digest));

    const selected = new Set<string>();
    for (const raw of selection.paths) {
      const path = parseClaimPath(raw);
      const hits = getAtPath(claims, path) === undefined ? [] : resolved.filter((r) => onPath(r, path));
      if (hits.length === 0) {
        const message = `no disclosable claim at ${formatClaimPath(path)}`;
        if (this.config.onUnmatchedSelection === 'error') throw new UnknownClaimSelectedError(message);
        warnings.push(message);
        continue;
      }
      for (const hit of hits) selected.add(hit.disclosure.digest);
    }
    return selected;
  }
}

function onPath(r: ResolvedDisclosure, path: ClaimPath): boolean {
  return isPathPrefix(r.path, path) || isPathPrefix(path, r.path);
}

async function assertSameKey(holderKey: JWK, bound: JWK) {
  let have: string;
  let want: string;
  try {
    [have, want] = await Promise.all([jwkThumbprintSha256(toPublicJwk(holderKey)), jwkThumbprintSha256(bound)]);
  } catch (err) {
    throw new MissingBindingKeyError(`holder key cannot be compared with cnf.jwk: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (have !== want) throw new MissingBindingKeyError('holder key does not match the key the credential is bound to');
}
