import Fastify from 'fastify';
import cors from '@fastify/cors';
import type { JWK } from 'jose';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  ConfigError,
  JwkSchema,
  createAuditLog,
  didKeyFromPublicKeyEd25519,
  generateEd25519KeyPair,
  httpStatusFor,
  isJsonObject,
  isJsonValue,
  isSdJwtError,
  readAuditEvents,
  toPrivateJwkEd25519,
  toPublicJwk,
  type JsonObject,
} from '@sd-disclose/shared';
import { loadIssuerServiceConfig, type IssuerServiceConfig } from './config.js';
import { SdJwtIssuer } from './issuer.js';

const issueBodySchema = z.object({
  claims: z.custom<JsonObject>((v) => isJsonObject(v) && isJsonValue(v), 'claims must be a JSON object'),
  holderPublicKey: JwkSchema.optional(),
  disclosurePaths: z.array(z.string().min(1)).optional(),
});

export type IssuerServerOptions = {
  config?: IssuerServiceConfig;
  /** Milliseconds since the epoch; `Date.now` when absent. */
  now?: () => number;
};

function issuerIdentity(config: IssuerServiceConfig): { issuerId: string; signingKey: JWK } {
  if (config.ISSUER_SIGNING_JWK && config.ISSUER_ID) {
    return { issuerId: config.ISSUER_ID, signingKey: config.ISSUER_SIGNING_JWK };
  }
  if (config.SIGNATURE_ALG !== 'EdDSA') {
    throw new ConfigError(`ISSUER_SIGNING_JWK is required for ${config.SIGNATURE_ALG}`);
  }
  // In-memory Ed25519 key; its did:key doubles as the issuer identifier.
  const keypair = generateEd25519KeyPair();
  return {
    issuerId: config.ISSUER_ID ?? didKeyFromPublicKeyEd25519(keypair.publicKey),
    signingKey: { ...toPrivateJwkEd25519(keypair.privateKey), kid: 'issuer-ed25519-1' },
  };
}

export function buildServer(options: IssuerServerOptions = {}) {
  const config = options.config ?? loadIssuerServiceConfig();
  const now = options.now ?? Date.now;
  const { issuerId, signingKey } = issuerIdentity(config);
  const publicJwk = toPublicJwk(signingKey);
  const audit = createAuditLog({ component: 'issuer', file: config.AUDIT_LOG_FILE, echo: config.AUDIT_ECHO });
  const issuer = new SdJwtIssuer({
    config: {
      digestAlgorithm: config.SD_DIGEST_ALG,
      signatureAlgorithm: config.SIGNATURE_ALG,
      disclosurePolicy: { kind: 'top-level' },
      decoys: { mode: 'random', min: config.SD_DECOYS_MIN, max: config.SD_DECOYS_MAX, arrays: true },
      typ: config.SD_JWT_TYP,
    },
    signingKey,
    audit,
  });

  const app = Fastify({ logger: false });
  app.register(cors, { origin: true });

  app.setErrorHandler(async (err, _req, reply) => {
    if (isSdJwtError(err)) {
      await audit.log('issue_failed', { code: err.code });
      return reply.code(httpStatusFor(err)).send({ error: err.code, message: err.message });
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: 'invalid_request', message: err.message });
    }
    await audit.log('issue_failed', { code: 'internal_error' });
    return reply.code(500).send({ error: 'internal_error', message: 'unexpected issuer failure' });
  });

  app.post('/credentials', async (req, reply) => {
    const parsed = issueBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'invalid_request', message: parsed.error.issues[0]?.message ?? 'invalid body' });
    }
    const { claims, holderPublicKey, disclosurePaths } = parsed.data;
    if (claims.iss !== undefined && claims.iss !== issuerId) {
      return reply.code(400).send({ error: 'invalid_request', message: 'iss is set by the issuer' });
    }

    const issued = await issuer.issue({
      claims: { ...claims, iss: issuerId },
      holderPublicKey,
      disclosurePolicy: disclosurePaths ? { kind: 'paths', paths: disclosurePaths } : undefined,
      issuedAt: Math.floor(now() / 1000),
      expiresInSeconds: config.CREDENTIAL_TTL_SECONDS,
    });
    return reply.send({
      sdJwt: issued.combined,
      disclosures: issued.disclosures.map((d) => d.encoded),
      decoyDigests: issued.decoyDigests,
    });
  });

  app.get('/.well-known/jwks.json', async (_req, reply) => {
    return reply.send({ issuer: issuerId, keys: [publicJwk] });
  });

  app.get('/audit', async (_req, reply) => {
    if (!config.AUDIT_LOG_FILE) return reply.send({ events: [] });
    return reply.send({ events: await readAuditEvents(config.AUDIT_LOG_FILE) });
  });

  return app;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const config = loadIssuerServiceConfig();
  const app = buildServer({ config });
  app.listen({ port: config.PORT, host: '127.0.0.1' }).then(() => {
    console.log(`Issuer listening on http://127.0.0.1:${config.PORT}`);
  }, (err: unknown) => {
    console.error('[ISSUER] listen_failed', err);
    process.exitCode = 1;
  });
}
