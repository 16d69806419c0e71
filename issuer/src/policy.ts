import {
  PolicyError,
  formatClaimPath,
  getAtPath,
  parseClaimPath,
  pathKey,
  type ClaimPath,
  type DisclosurePolicy,
  type JsonObject,
} from '@sd-disclose/shared';

/** Top-level claims that always stay in the clear; verifiers need them before any disclosure is read. */
export const PROTECTED_CLAIMS: readonly string[] = ['iss', 'iat', 'exp', 'nbf', 'cnf', '_sd_alg'];

export type ClaimSelector = (path: ClaimPath) => boolean;

function isProtected(path: ClaimPath): boolean {
  const [head] = path;
  return typeof head === 'string' && PROTECTED_CLAIMS.includes(head);
}

/**
 * Turns a disclosure policy into a path predicate for one claim set.
 * Explicit paths must name claims that exist.
 */
export function compileDisclosurePolicy(policy: DisclosurePolicy, claims: JsonObject): ClaimSelector {
  switch (policy.kind) {
    case 'top-level':
      return (path) => path.length === 1 && !isProtected(path);
    case 'recursive':
      return (path) => path.length > 0 && !isProtected(path);
    case 'paths': {
      const selected = new Set<string>();
      for (const raw of policy.paths) {
        const path = parseClaimPath(raw);
        if (path.length === 0) throw new PolicyError('disclosure path is empty');
        if (isProtected(path)) {
          throw new PolicyError(`claim ${formatClaimPath(path)} cannot be selectively disclosable`);
        }
        if (getAtPath(claims, path) === undefined) {
          throw new PolicyError(`disclosure path ${formatClaimPath(path)} does not exist in the claim set`);
        }
        selected.add(pathKey(path));
      }
      return (path) => selected.has(pathKey(path));
    }
  }
}
