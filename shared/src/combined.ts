import { EncodingError } from './errors.js';
import { isCompactJws } from './jws.js';

export const SD_JWT_SEPARATOR = '~';

/** `<signed object>~<disclosure>~...~<holder binding or empty>` */
export type CombinedArtifact = {
  jwt: string;
  disclosures: string[];
  holderBinding?: string;
};

export function splitCombined(artifact: string): CombinedArtifact {
  const segments = artifact.split(SD_JWT_SEPARATOR);
  const [jwt] = segments;
  if (!jwt || !isCompactJws(jwt)) throw new EncodingError('artifact does not start with a compact signed object');
  if (segments.length === 1) return { jwt, disclosures: [] };

  const middle = segments.slice(1, -1);
  if (middle.some((s) => s.length === 0)) throw new EncodingError('artifact contains an empty disclosure segment');
  const last = segments[segments.length - 1];

  // An empty trailing segment means no holder binding; a dotted one is the binding JWS.
  if (last === '') return { jwt, disclosures: middle };
  if (last.includes('.')) {
    if (!isCompactJws(last)) throw new EncodingError('holder binding segment is not a compact signed object');
    return { jwt, disclosures: middle, holderBinding: last };
  }
  return { jwt, disclosures: [...middle, last] };
}

export function joinCombined({ jwt, disclosures, holderBinding }: CombinedArtifact): string {
  return [jwt, ...disclosures, holderBinding ?? ''].join(SD_JWT_SEPARATOR);
}
