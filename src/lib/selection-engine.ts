import { DEFAULT_DECAY_FACTOR } from '../types/source-config';

export type RandomSource = () => number;

/**
 * Turn a raw configuration value into a usable decay factor.
 * Numbers and numeric strings pass through; anything else yields the default.
 */
export function resolveDecayFactor(raw: unknown, fallback: number = DEFAULT_DECAY_FACTOR): number {
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return raw;
  }
  if (typeof raw === 'string' && raw.trim() !== '') {
    const parsed = Number(raw);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return fallback;
}

/**
 * Uniform draw in the open interval (0, 1)
 */
function drawOpenUnit(random: RandomSource): number {
  let u = random();
  while (u <= 0 || u >= 1) {
    u = random();
  }
  return u;
}

/**
 * Uniform sample of `count` items without replacement (partial Fisher-Yates)
 */
export function sampleUniform<T>(items: readonly T[], count: number, random: RandomSource = Math.random): T[] {
  const pool = items.slice();
  const size = Math.min(Math.max(0, Math.floor(count)), pool.length);

  for (let i = 0; i < size; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    const swap = pool[i];
    pool[i] = pool[j];
    pool[j] = swap;
  }
  return pool.slice(0, size);
}

/**
 * Recency-biased sample without replacement.
 *
 * `items` must be sorted newest first. Item i gets weight exp(-i * decayFactor)
 * and key u^(1/w) for u uniform in (0,1); the `maxCount` largest keys win
 * (Efraimidis-Spirakis). Keys are compared as ln(u) * exp(i * decayFactor),
 * which orders identically and stays finite for deep ranks.
 *
 * With decayFactor <= 0 (or NaN) every item is equally likely.
 */
export function selectWeighted<T>(
  items: readonly T[],
  maxCount: number,
  decayFactor: number,
  random: RandomSource = Math.random
): T[] {
  const count = Math.floor(maxCount);
  if (!(count > 0) || items.length === 0) {
    return [];
  }
  if (items.length <= count) {
    return items.slice();
  }
  if (!(decayFactor > 0)) {
    return sampleUniform(items, count, random);
  }

  const keyed = items.map((item, rank) => ({
    item,
    key: Math.log(drawOpenUnit(random)) * Math.exp(rank * decayFactor),
  }));

  keyed.sort((a, b) => b.key - a.key);
  return keyed.slice(0, count).map((entry) => entry.item);
}
