import { z } from 'zod';
import { DIGEST_ALGORITHMS, SIGNATURE_ALGORITHMS, parseConfig } from '@sd-disclose/shared';

const toNumber = (fallback: number) => (value: unknown) => {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const commaList = (fallback: string) => (value: unknown) =>
  (typeof value === 'string' && value.trim() !== '' ? value : fallback)
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

const envSchema = z.object({
  PORT: z.preprocess(toNumber(4002), z.number().int().min(1).max(65535)),
  VERIFIER_AUDIENCE: z.string().min(1).default('https://verifier.local.test'),
  ISSUER_BASE: z.string().url().default('http://127.0.0.1:4001'),
  // empty: only the issuer published at ISSUER_BASE
  TRUSTED_ISSUERS: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? commaList('')(value) : undefined),
    z.array(z.string().min(1)).optional(),
  ),
  SIGNATURE_ALGS: z.preprocess(commaList('EdDSA,ES256'), z.array(z.enum(SIGNATURE_ALGORITHMS)).min(1)),
  SD_DIGEST_ALGS: z.preprocess(commaList('sha-256'), z.array(z.enum(DIGEST_ALGORITHMS)).min(1)),
  REQUIRE_HOLDER_BINDING: z.preprocess((value) => value === 'true', z.boolean()),
  CLOCK_TOLERANCE_SECONDS: z.preprocess(toNumber(60), z.number().int().min(0)),
  HOLDER_BINDING_MAX_AGE_SECONDS: z.preprocess(toNumber(300), z.number().int().positive()),
  NONCE_TTL_SECONDS: z.preprocess(toNumber(300), z.number().int().positive()),
  AUDIT_LOG_FILE: z.preprocess(emptyToUndefined, z.string().optional()),
  AUDIT_ECHO: z.preprocess((value) => value !== 'false', z.boolean()),
});

export type VerifierServiceConfig = z.infer<typeof envSchema>;

export function loadVerifierServiceConfig(env: NodeJS.ProcessEnv = process.env): VerifierServiceConfig {
  return parseConfig(envSchema, env, 'verifier service');
}
