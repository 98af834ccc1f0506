/**
 * Helpers that work with any `() => number` source returning values in [0, 1).
 */

/**
 * Remove and return the element at a uniformly random index.
 * Consumes exactly one draw, even for an empty array.
 */
export function takeRandom<T>(rng: () => number, array: T[]): T | undefined {
  const index = Math.floor(rng() * array.length);
  if (array.length === 0) return undefined;
  const [taken] = array.splice(index, 1);
  return taken;
}
