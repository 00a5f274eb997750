import seedrandom from 'seedrandom';

export interface RandomSource {
  /** Uniform draw in [0, 1). */
  next(): number;
  int(maxExclusive: number): number;
  range(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
  chance(probability: number): boolean;
}

export interface WeightedEntry<T> {
  item: T;
  weight: number;
}

/** Seeded source over seedrandom's ARC4 generator; omitting the seed draws one from ambient entropy. */
export function createRandom(seed?: string): RandomSource {
  const rng = seedrandom(seed);
  const draw = () => rng();
  const int = (maxExclusive: number) => (maxExclusive <= 1 ? 0 : Math.floor(draw() * maxExclusive));

  return {
    next: draw,
    int,
    range: (min: number, max: number) => min + draw() * (max - min),
    pick<T>(items: readonly T[]): T {
      if (items.length === 0) {
        throw new Error('[random] Attempted to pick from an empty list');
      }
      return items[int(items.length)];
    },
    chance: (probability: number) => probability > 0 && (probability >= 1 || draw() < probability)
  };
}

/**
 * Cumulative-weight lottery. Non-positive and non-finite weights never win;
 * returns undefined when nothing carries weight.
 */
export function pickWeighted<T>(random: RandomSource, entries: readonly WeightedEntry<T>[]): T | undefined {
  const usable = entries.filter((entry) => Number.isFinite(entry.weight) && entry.weight > 0);
  const total = usable.reduce((sum, entry) => sum + entry.weight, 0);
  if (usable.length === 0 || total <= 0) {
    return undefined;
  }

  const roll = random.next() * total;
  let cumulative = 0;
  for (const entry of usable) {
    cumulative += entry.weight;
    if (roll < cumulative) {
      return entry.item;
    }
  }
  return usable[usable.length - 1].item;
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}
