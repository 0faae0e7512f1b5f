/**
 * Random source used for tie-breaks and copy selection.
 * Swap in seededRandom() wherever results must be reproducible.
 */
export interface RandomSource {
  /** Uniform integer in [0, maxExclusive) */
  nextInt(maxExclusive: number): number;
}

export const mathRandom: RandomSource = {
  nextInt(maxExclusive: number): number {
    return Math.floor(Math.random() * maxExclusive);
  },
};

/**
 * Deterministic source (mulberry32)
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    nextInt(maxExclusive: number): number {
      return Math.floor(next() * maxExclusive);
    },
  };
}

export function pickRandom<T>(items: readonly T[], random: RandomSource): T | null {
  if (items.length === 0) return null;
  return items[random.nextInt(items.length)] ?? null;
}
