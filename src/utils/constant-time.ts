import { timingSafeEqual } from "node:crypto";

/**
 * Branch-free equality of two non-negative 31-bit integers (array lengths).
 * Returns 1 when equal, 0 otherwise.
 */
export function constantTimeEq(x: number, y: number): number {
  return ((x ^ y) - 1) >>> 31;
}

/**
 * Compare two byte strings without leaking where they differ. Lengths are
 * compared first; contents are only compared when the lengths agree, since
 * timingSafeEqual requires equal sizes.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (constantTimeEq(a.length, b.length) === 0) {
    return false;
  }
  return timingSafeEqual(a, b);
}
