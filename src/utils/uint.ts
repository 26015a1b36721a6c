/** Upper bounds for the unsigned widths used by settings and hash fields. */
export const UINT_MAX = {
  8: 0xff,
  32: 0xffffffff,
} as const;

export type UintBits = keyof typeof UINT_MAX;

export class InvalidNumberError extends Error {
  readonly text: string;

  constructor(text: string) {
    super(`"${text}" is not an unsigned base-10 integer`);
    this.name = "InvalidNumberError";
    this.text = text;
  }
}

export class NumericOverflowError extends RangeError {
  readonly text: string;
  readonly bits: UintBits;

  constructor(text: string, bits: UintBits) {
    super(`"${text}" is out of range for an unsigned ${bits}-bit integer (max ${UINT_MAX[bits]})`);
    this.name = "NumericOverflowError";
    this.text = text;
    this.bits = bits;
  }
}

/**
 * Parse a plain decimal string into an unsigned integer of the given width.
 * Signs, whitespace, prefixes and fractions are rejected.
 */
export function parseUnsigned(text: string, bits: UintBits): number {
  if (!/^[0-9]+$/.test(text)) {
    throw new InvalidNumberError(text);
  }
  const value = Number(text);
  if (value > UINT_MAX[bits]) {
    throw new NumericOverflowError(text, bits);
  }
  return value;
}
