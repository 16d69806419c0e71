import type { ClaimPath, DecoyConfig, RandomSource } from '@sd-disclose/shared';

/** A container that received at least one digest placeholder (the root object always qualifies). */
export type DecoySite = {
  container: 'object' | 'array';
  path: ClaimPath;
  disclosable: number;
};

export interface DecoyPolicy {
  /** How many decoy digests to add at this site. */
  count(site: DecoySite, random: RandomSource): number;
  /** Index in [0, length] where the next array decoy goes. */
  arrayInsertIndex(length: number, random: RandomSource): number;
}

const randomPosition = (length: number, random: RandomSource) => random.int(length + 1);

export const noDecoys: DecoyPolicy = {
  count: () => 0,
  arrayInsertIndex: (length) => length,
};

export function fixedDecoys(counts: { object: number; array: number }): DecoyPolicy {
  return {
    count: (site) => (site.container === 'object' ? counts.object : counts.array),
    arrayInsertIndex: randomPosition,
  };
}

export function randomDecoys(range: { min: number; max: number; arrays: boolean }): DecoyPolicy {
  return {
    count(site, random) {
      if (site.container === 'array' && !range.arrays) return 0;
      return range.min + random.int(range.max - range.min + 1);
    },
    arrayInsertIndex: randomPosition,
  };
}

export function decoyPolicyFromConfig(config: DecoyConfig): DecoyPolicy {
  switch (config.mode) {
    case 'none':
      return noDecoys;
    case 'fixed':
      return fixedDecoys(config);
    case 'random':
      return randomDecoys(config);
  }
}
