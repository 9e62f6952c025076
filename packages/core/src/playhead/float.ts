/**
 * Float stepping for exclusive frame bounds.
 */

const scratch = new Float64Array(1);
const scratchBits = new BigInt64Array(scratch.buffer);

/**
 * The largest double strictly less than `x`.
 *
 * Frame ranges are half-open, so the last playable frame of `[start, end)`
 * is `previousFloat(end)`.
 */
export function previousFloat(x: number): number {
  if (Number.isNaN(x) || x === -Infinity) return x;
  if (x === 0) return -Number.MIN_VALUE;

  scratch[0] = x;
  scratchBits[0] = (scratchBits[0] ?? 0n) + (x > 0 ? -1n : 1n);
  return scratch[0] ?? x;
}
