/**
 * Seeded PRNG (mulberry32). The same seed always yields the same sequence.
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function shuffle<T>(items: T[], random: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export interface SplitIndices {
  train: number[];
  validation: number[];
}

/**
 * Stratified train/validation split over binary labels.
 * Each class keeps at least one row on both sides when it has two or more rows.
 */
export function stratifiedSplit(labels: number[], validationFraction: number, seed: number): SplitIndices {
  const random = createRandom(seed);
  const train: number[] = [];
  const validation: number[] = [];

  for (const label of [0, 1]) {
    const members = shuffle(
      labels.flatMap((l, i) => (l === label ? [i] : [])),
      random
    );
    const wanted = Math.round(members.length * validationFraction);
    const count = members.length < 2 ? 0 : Math.min(members.length - 1, Math.max(1, wanted));
    validation.push(...members.slice(0, count));
    train.push(...members.slice(count));
  }

  return {
    train: train.sort((a, b) => a - b),
    validation: validation.sort((a, b) => a - b),
  };
}
