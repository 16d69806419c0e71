import { z } from 'zod';
import { ConfigError, DIGEST_ALGORITHMS, JwkSchema, SIGNATURE_ALGORITHMS, parseConfig } from '@sd-disclose/shared';

const toNumber = (fallback: number) => (value: unknown) => {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const jsonJwk = z.preprocess((value) => {
  if (typeof value !== 'string' || value === '') return undefined;
  try {
    return JSON.parse(value);
  } catch {
    return value; // left for JwkSchema to reject
  }
}, JwkSchema.optional());

const envSchema = z.object({
  PORT: z.preprocess(toNumber(4001), z.number().int().min(1).max(65535)),
  // defaults to the did:key of a generated Ed25519 key
  ISSUER_ID: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  ISSUER_SIGNING_JWK: jsonJwk,
  SIGNATURE_ALG: z.enum(SIGNATURE_ALGORITHMS).default('EdDSA'),
  SD_DIGEST_ALG: z.enum(DIGEST_ALGORITHMS).default('sha-256'),
  SD_DECOYS_MIN: z.preprocess(toNumber(2), z.number().int().min(0)),
  SD_DECOYS_MAX: z.preprocess(toNumber(5), z.number().int().min(0)),
  SD_JWT_TYP: z.string().default('vc+sd-jwt'),
  CREDENTIAL_TTL_SECONDS: z.preprocess(toNumber(86_400), z.number().int().positive()),
  AUDIT_LOG_FILE: z.preprocess(emptyToUndefined, z.string().optional()),
  AUDIT_ECHO: z.preprocess((value) => value !== 'false', z.boolean()),
});

export type IssuerServiceConfig = z.infer<typeof envSchema>;

export function loadIssuerServiceConfig(env: NodeJS.ProcessEnv = process.env): IssuerServiceConfig {
  const parsed = parseConfig(envSchema, env, 'issuer service');
  if (parsed.ISSUER_SIGNING_JWK && !parsed.ISSUER_ID) {
    throw new ConfigError('ISSUER_ID is required when ISSUER_SIGNING_JWK is set');
  }
  if (parsed.SD_DECOYS_MIN > parsed.SD_DECOYS_MAX) {
    throw new ConfigError('SD_DECOYS_MIN must not exceed SD_DECOYS_MAX');
  }
  return parsed;
}
