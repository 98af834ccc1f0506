/**
 * Non-negative int32 derived from a millisecond clock.
 *
 * Used only to substitute seeds a caller left out; never inside generation.
 */
export function timeDerivedSeed(now: () => number = Date.now): number {
  return Math.floor(now()) & 0x7fffffff;
}
