import type { RandomSource } from '../types/index.js';

export const defaultRandom: RandomSource = Math.random;

/**
 * Uniform value in [min, max]
 */
export function randomInRange(min: number, max: number, random: RandomSource = defaultRandom): number {
  if (min >= max) return min;
  return min + random() * (max - min);
}

/**
 * Uniform pick from a list, or undefined when the list is empty
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource = defaultRandom): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}
