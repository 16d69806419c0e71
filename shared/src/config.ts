import { z } from 'zod';
import { ConfigError } from './errors.js';
import { SIGNATURE_ALGORITHMS } from './jws.js';
import { DIGEST_ALGORITHMS } from './sdjwt.js';

const claimPath = z.union([
  z.string().min(1),
  z.array(z.union([z.string(), z.number().int().nonnegative()])).min(1),
]);

const b64u = z.string().regex(/^[A-Za-z0-9_-]+$/);

/** Public or private JWK members for the key types jose signs with. */
export const JwkSchema = z.object({
  kty: z.enum(['OKP', 'EC', 'RSA']),
  crv: z.string().optional(),
  x: b64u.optional(),
  y: b64u.optional(),
  n: b64u.optional(),
  e: b64u.optional(),
  d: b64u.optional(),
  p: b64u.optional(),
  q: b64u.optional(),
  dp: b64u.optional(),
  dq: b64u.optional(),
  qi: b64u.optional(),
  kid: z.string().optional(),
  alg: z.string().optional(),
  use: z.string().optional(),
});

export const DisclosurePolicySchema = z.discriminatedUnion('kind', [
  // every top-level claim except the registered ones
  z.object({ kind: z.literal('top-level') }),
  // every object member and array element at every depth
  z.object({ kind: z.literal('recursive') }),
  z.object({ kind: z.literal('paths'), paths: z.array(claimPath) }),
]);
export type DisclosurePolicy = z.infer<typeof DisclosurePolicySchema>;

export const DecoyConfigSchema = z.union([
  z.object({ mode: z.literal('none') }),
  z.object({
    mode: z.literal('fixed'),
    object: z.number().int().min(0),
    array: z.number().int().min(0),
  }),
  z
    .object({
      mode: z.literal('random'),
      min: z.number().int().min(0),
      max: z.number().int().min(0),
      arrays: z.boolean(),
    })
    .refine((c) => c.min <= c.max, { message: 'min must not exceed max' }),
]);
export type DecoyConfig = z.infer<typeof DecoyConfigSchema>;

export const IssuerConfigSchema = z.object({
  digestAlgorithm: z.enum(DIGEST_ALGORITHMS),
  signatureAlgorithm: z.enum(SIGNATURE_ALGORITHMS),
  disclosurePolicy: DisclosurePolicySchema,
  decoys: DecoyConfigSchema,
  typ: z.string().min(1),
});
export type IssuerConfig = z.infer<typeof IssuerConfigSchema>;

export const HolderConfigSchema = z.object({
  signatureAlgorithm: z.enum(SIGNATURE_ALGORITHMS),
  onUnmatchedSelection: z.enum(['error', 'ignore']),
});
export type HolderConfig = z.infer<typeof HolderConfigSchema>;

export const VerifierConfigSchema = z.object({
  signatureAlgorithms: z.array(z.enum(SIGNATURE_ALGORITHMS)).min(1),
  digestAlgorithms: z.array(z.enum(DIGEST_ALGORITHMS)).min(1),
  requireHolderBinding: z.boolean(),
  clockToleranceSeconds: z.number().int().min(0),
  holderBindingMaxAgeSeconds: z.number().int().positive(),
});
export type VerifierConfig = z.infer<typeof VerifierConfigSchema>;

export function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid ${what} config: ${issues}`, { cause: result.error });
  }
  return result.data;
}
