import { readFile, readdir, stat, writeFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  ConfigError,
  createAuditLog,
  deriveEd25519KeyPair,
  isJsonObject,
  isJsonValue,
  parseConfig,
  seededRandom,
  silentAudit,
  toPrivateJwkEd25519,
  toPublicJwkEd25519,
  UnknownIssuerError,
  type AuditLog,
  type ClaimPath,
  type JsonObject,
  type JsonValue,
} from '@sd-disclose/shared';
import { SdJwtIssuer } from '@sd-disclose/issuer';
import { SdJwtHolder } from '@sd-disclose/holder';
import { SdJwtVerifier } from '@sd-disclose/verifier';

export const SETTINGS_FILE = 'settings.json';
export const SPECIFICATION_FILE = 'specification.json';

const jsonObject = z.custom<JsonObject>((v) => isJsonObject(v) && isJsonValue(v), 'expected a JSON object');

/** `true` marks a claim to reveal; nested objects and arrays mirror the claim set. */
type SelectionTree = boolean | { [key: string]: SelectionTree } | SelectionTree[];
const selectionTree: z.ZodType<SelectionTree> = z.lazy(() =>
  z.union([z.boolean(), z.array(selectionTree), z.record(selectionTree)]),
);

const settingsSchema = z.object({
  identifiers: z.object({ issuer: z.string().min(1), verifier: z.string().min(1) }),
  iat: z.number().int(),
  exp: z.number().int(),
  random_seed: z.union([z.string(), z.number()]),
  holder_binding_nonce: z.string().min(1),
});
export type FixtureSettings = z.infer<typeof settingsSchema>;

const caseSchema = z.object({
  user_claims: jsonObject,
  // explicit paths win over `policy`
  sd_paths: z.array(z.string().min(1)).optional(),
  policy: z.enum(['top-level', 'recursive']).default('top-level'),
  holder_disclosed_claims: z.union([z.array(z.string().min(1)), selectionTree.transform((tree) => selectionPaths(tree))]),
  holder_binding: z.boolean().default(false),
  add_decoy_claims: z.boolean().default(false),
});
export type FixtureCase = z.infer<typeof caseSchema>;

/** Artifacts written next to each specification.json; `undefined` entries are skipped. */
export type CaseArtifacts = Record<string, JsonValue | undefined>;

// written verbatim as .txt; everything else as pretty-printed .json
const TEXT_ARTIFACTS: readonly string[] = ['sd_jwt_serialized', 'combined_issuance', 'hb_jwt_serialized', 'combined_presentation'];

function selectionPaths(tree: SelectionTree, at: ClaimPath = []): ClaimPath[] {
  if (tree === true) return [at];
  if (tree === false) return [];
  if (Array.isArray(tree)) return tree.flatMap((sub, i) => selectionPaths(sub, [...at, i]));
  return Object.entries(tree).flatMap(([key, sub]) => selectionPaths(sub, [...at, key]));
}

async function readJson(file: string): Promise<unknown> {
  const txt = await readFile(file, 'utf8');
  try {
    return JSON.parse(txt);
  } catch (err) {
    throw new ConfigError(`${file} is not valid JSON`, { cause: err });
  }
}

export async function loadSettings(baseDir: string): Promise<FixtureSettings> {
  return parseConfig(settingsSchema, await readJson(path.join(baseDir, SETTINGS_FILE)), 'fixture settings');
}

/** Runs one case through issuance, presentation and verification. Same inputs, same artifacts. */
export async function buildCaseArtifacts(settings: FixtureSettings, testcase: FixtureCase): Promise<CaseArtifacts> {
  const seed = String(settings.random_seed);
  const issuerKeys = deriveEd25519KeyPair(`${seed}:issuer`);
  const holderKeys = deriveEd25519KeyPair(`${seed}:holder`);
  const issuerPublicKey = toPublicJwkEd25519(issuerKeys.publicKey);
  const bound = testcase.holder_binding;
  const clock = () => settings.iat;

  const issuer = new SdJwtIssuer({
    config: {
      digestAlgorithm: 'sha-256',
      signatureAlgorithm: 'EdDSA',
      disclosurePolicy: testcase.sd_paths ? { kind: 'paths', paths: testcase.sd_paths } : { kind: testcase.policy },
      decoys: testcase.add_decoy_claims ? { mode: 'random', min: 1, max: 5, arrays: true } : { mode: 'none' },
      typ: 'vc+sd-jwt',
    },
    signingKey: toPrivateJwkEd25519(issuerKeys.privateKey),
    random: seededRandom(seed),
  });
  const issued = await issuer.issue({
    claims: { iss: settings.identifiers.issuer, iat: settings.iat, exp: settings.exp, ...testcase.user_claims },
    holderPublicKey: bound ? toPublicJwkEd25519(holderKeys.publicKey) : undefined,
  });

  const holder = new SdJwtHolder({
    config: { signatureAlgorithm: 'EdDSA', onUnmatchedSelection: 'error' },
    clock,
  });
  const presentation = await holder.present(
    issued.combined,
    { kind: 'paths', paths: testcase.holder_disclosed_claims },
    bound
      ? {
          nonce: settings.holder_binding_nonce,
          audience: settings.identifiers.verifier,
          holderKey: toPrivateJwkEd25519(holderKeys.privateKey),
        }
      : undefined,
  );

  const verifier = new SdJwtVerifier({
    config: {
      signatureAlgorithms: ['EdDSA'],
      digestAlgorithms: ['sha-256'],
      requireHolderBinding: bound,
      clockToleranceSeconds: 0,
      holderBindingMaxAgeSeconds: 300,
    },
    resolveIssuerKey: (iss) => {
      if (iss !== settings.identifiers.issuer) throw new UnknownIssuerError(`unknown issuer ${iss}`);
      return issuerPublicKey;
    },
    clock,
  });
  const verified = await verifier.verify(
    presentation.combined,
    bound ? { nonce: settings.holder_binding_nonce, audience: settings.identifiers.verifier } : {},
  );

  return {
    user_claims: testcase.user_claims,
    sd_jwt_payload: issued.payload,
    sd_jwt_serialized: issued.jwt,
    combined_issuance: issued.combined,
    hb_jwt_payload: presentation.holderBindingPayload,
    hb_jwt_serialized: presentation.holderBindingJwt,
    combined_presentation: presentation.combined,
    verified_contents: verified.claims,
    decoy_digests: testcase.add_decoy_claims ? issued.decoyDigests : undefined,
  };
}

async function writeArtifacts(dir: string, artifacts: CaseArtifacts) {
  for (const [name, data] of Object.entries(artifacts)) {
    if (data === undefined) continue;
    if (typeof data === 'string' && TEXT_ARTIFACTS.includes(name)) {
      await writeFile(path.join(dir, `${name}.txt`), data);
    } else {
      await writeFile(path.join(dir, `${name}.json`), JSON.stringify(data, null, 2) + '\n');
    }
  }
}

async function caseDirectories(baseDir: string, only: readonly string[]): Promise<string[]> {
  const names = only.length > 0 ? [...only] : (await readdir(baseDir)).sort();
  const dirs: string[] = [];
  for (const name of names) {
    const dir = path.join(baseDir, name);
    const found = await stat(path.join(dir, SPECIFICATION_FILE)).then(
      (s) => s.isFile(),
      (err: NodeJS.ErrnoException) => {
        if (err.code === 'ENOENT' || err.code === 'ENOTDIR') return false;
        throw err;
      },
    );
    if (found) dirs.push(dir);
    else if (only.length > 0) throw new ConfigError(`${name} has no ${SPECIFICATION_FILE}`);
  }
  return dirs;
}

/** Regenerates every case under `baseDir` (or only the named ones); returns the case directories written. */
export async function generateFixtures(
  baseDir: string,
  opts: { cases?: readonly string[]; audit?: AuditLog } = {},
): Promise<string[]> {
  const audit = opts.audit ?? silentAudit;
  const settings = await loadSettings(baseDir);
  const dirs = await caseDirectories(baseDir, opts.cases ?? []);
  for (const dir of dirs) {
    const testcase = parseConfig(caseSchema, await readJson(path.join(dir, SPECIFICATION_FILE)), path.basename(dir));
    await writeArtifacts(dir, await buildCaseArtifacts(settings, testcase));
    await audit.log('fixture_written', { case: path.basename(dir) });
  }
  return dirs;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const [baseDir = process.cwd(), ...cases] = process.argv.slice(2);
  generateFixtures(path.resolve(baseDir), { cases, audit: createAuditLog({ component: 'fixtures', echo: true }) }).then(
    (dirs) => console.log(`Generated ${dirs.length} test case(s)`),
    (err: unknown) => {
      console.error('[FIXTURES] generation_failed', err);
      process.exitCode = 1;
    },
  );
}
