import Fastify from 'fastify';
import cors from '@fastify/cors';
import type { JWK } from 'jose';
import { randomBytes, randomUUID } from 'crypto';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  JwkSchema,
  UnknownIssuerError,
  createAuditLog,
  didKeyResolver,
  httpStatusFor,
  isSdJwtError,
  jwkThumbprintSha256,
  readAuditEvents,
  type CompactHeader,
} from '@sd-disclose/shared';
import { loadVerifierServiceConfig, type VerifierServiceConfig } from './config.js';
import { SdJwtVerifier, type VerifiedSdJwt } from './verifier.js';

export type IssuerClient = {
  getJson: (path: string) => Promise<unknown>;
};

export type VerifierServerOptions = {
  config?: VerifierServiceConfig;
  issuerClient?: IssuerClient;
  /** Milliseconds since the epoch; `Date.now` when absent. */
  now?: () => number;
};

const presentBodySchema = z.object({
  presentation: z.string().min(1),
  state: z.string().min(1),
});

const jwksSchema = z.object({
  issuer: z.string().min(1),
  keys: z.array(JwkSchema),
});

type NonceInfo = { exp: number; corrId: string };

function httpIssuerClient(issuerBase: string): IssuerClient {
  return {
    async getJson(path) {
      const res = await fetch(`${issuerBase}${path}`);
      if (!res.ok) throw new Error(`GET ${path} returned ${res.status}`);
      return res.json();
    },
  };
}

export function buildServer(options: VerifierServerOptions = {}) {
  const config = options.config ?? loadVerifierServiceConfig();
  const now = options.now ?? Date.now;
  const issuerClient = options.issuerClient ?? httpIssuerClient(config.ISSUER_BASE);
  const audit = createAuditLog({ component: 'verifier', file: config.AUDIT_LOG_FILE, echo: config.AUDIT_ECHO });

  async function resolveIssuerKey(iss: string, header: CompactHeader): Promise<JWK> {
    if (config.TRUSTED_ISSUERS && !config.TRUSTED_ISSUERS.includes(iss)) {
      throw new UnknownIssuerError(`issuer ${iss} is not trusted`);
    }
    // listed did:key issuers resolve locally; any other issuer must be the one published at ISSUER_BASE
    if (iss.startsWith('did:key:') && config.TRUSTED_ISSUERS) return didKeyResolver(iss);
    const jwks = jwksSchema.safeParse(await issuerClient.getJson('/.well-known/jwks.json'));
    if (!jwks.success || jwks.data.issuer !== iss) throw new UnknownIssuerError(`issuer ${iss} publishes no key set`);
    const key = jwks.data.keys.find((k) => header.kid === undefined || k.kid === header.kid);
    if (!key) throw new UnknownIssuerError(`issuer ${iss} has no key ${header.kid ?? ''}`.trim());
    return key;
  }

  const verifier = new SdJwtVerifier({
    config: {
      signatureAlgorithms: config.SIGNATURE_ALGS,
      digestAlgorithms: config.SD_DIGEST_ALGS,
      requireHolderBinding: config.REQUIRE_HOLDER_BINDING,
      clockToleranceSeconds: config.CLOCK_TOLERANCE_SECONDS,
      holderBindingMaxAgeSeconds: config.HOLDER_BINDING_MAX_AGE_SECONDS,
    },
    resolveIssuerKey,
    clock: () => Math.floor(now() / 1000),
    audit,
  });

  const app = Fastify({ logger: false });
  app.register(cors, { origin: true });

  // Single-use challenge nonces
  const nonces = new Map<string, NonceInfo>();
  function sweep() {
    const nowSec = Math.floor(now() / 1000);
    for (const [k, info] of nonces.entries()) {
      if (info.exp < nowSec) nonces.delete(k);
    }
  }
  const sweepHandle: NodeJS.Timeout = setInterval(sweep, 60_000);
  sweepHandle.unref();
  app.addHook('onClose', async () => clearInterval(sweepHandle));

  app.setErrorHandler(async (err, _req, reply) => {
    if (isSdJwtError(err)) {
      return reply.code(httpStatusFor(err)).send({ error: err.code, message: err.message });
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: 'invalid_request', message: err.message });
    }
    await audit.log('request_failed', { code: 'internal_error' });
    return reply.code(500).send({ error: 'internal_error', message: 'unexpected verifier failure' });
  });

  app.get('/challenge', async (req, reply) => {
    const nonce = randomBytes(16).toString('base64url');
    const header = req.headers['x-correlation-id'];
    const corrId = typeof header === 'string' && header !== '' ? header : randomUUID();
    nonces.set(nonce, { exp: Math.floor(now() / 1000) + config.NONCE_TTL_SECONDS, corrId });
    return reply.header('x-correlation-id', corrId).send({
      nonce,
      aud: config.VERIFIER_AUDIENCE,
      expires_in: config.NONCE_TTL_SECONDS,
    });
  });

  app.post('/present', async (req, reply) => {
    const parsed = presentBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'invalid_request', message: parsed.error.issues[0]?.message ?? 'invalid body' });
    }
    const { presentation, state } = parsed.data;
    const nInfo = nonces.get(state);
    if (!nInfo || nInfo.exp < Math.floor(now() / 1000)) {
      await audit.log('presentation_failed', { reason: 'invalid_nonce' });
      return reply.code(401).send({ error: 'invalid_nonce', message: 'unknown or expired challenge' });
    }
    // consumed whether or not verification succeeds
    nonces.delete(state);

    let verified: VerifiedSdJwt;
    try {
      verified = await verifier.verify(presentation, { nonce: state, audience: config.VERIFIER_AUDIENCE });
    } catch (err) {
      if (isSdJwtError(err)) await audit.log('presentation_failed', { reason: err.code, correlationId: nInfo.corrId });
      throw err;
    }
    const binding = verified.holderBinding;
    await audit.log('presentation_verified', {
      disclosed: verified.disclosures.length,
      holderBinding: binding !== undefined,
      correlationId: nInfo.corrId,
    });
    return reply.header('x-correlation-id', nInfo.corrId).send({
      claims: verified.claims,
      holderBinding: binding
        ? { jkt: await jwkThumbprintSha256(binding.publicKey), issuedAt: binding.issuedAt }
        : null,
    });
  });

  app.get('/audit', async (_req, reply) => {
    if (!config.AUDIT_LOG_FILE) return reply.send({ events: [] });
    return reply.send({ events: await readAuditEvents(config.AUDIT_LOG_FILE) });
  });

  return app;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const config = loadVerifierServiceConfig();
  const app = buildServer({ config });
  app.listen({ port: config.PORT, host: '127.0.0.1' }).then(() => {
    console.log(`Verifier listening on http://127.0.0.1:${config.PORT}`);
  }, (err: unknown) => {
    console.error('[VERIFIER] listen_failed', err);
    process.exitCode = 1;
  });
}
