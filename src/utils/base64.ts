// Unpadded standard base64 (RFC 4648 §4 alphabet, no "=" padding).
//
// Buffer's own decoder skips characters it does not understand, which would
// turn a corrupted hash segment into a silent key mismatch. Decoding here is
// strict: anything Buffer would not produce from some byte string is rejected.

const ALPHABET = /[A-Za-z0-9+/]/;

export class CorruptBase64Error extends Error {
  readonly offset: number;

  constructor(offset: number) {
    super(`Illegal base64 data at input byte ${offset}`);
    this.name = "CorruptBase64Error";
    this.offset = offset;
  }
}

export function encodeBase64NoPad(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    .toString("base64")
    .replace(/=+$/, "");
}

export function decodeBase64NoPad(text: string): Uint8Array {
  for (let i = 0; i < text.length; i++) {
    if (!ALPHABET.test(text[i])) {
      throw new CorruptBase64Error(i);
    }
  }
  // A lone trailing character carries only 6 bits, never a whole byte.
  if (text.length % 4 === 1) {
    throw new CorruptBase64Error(text.length - 1);
  }

  const bytes = Buffer.from(text, "base64");

  // Non-zero bits after the last whole byte mean the text was not produced
  // by an encoder; re-encoding exposes them.
  if (encodeBase64NoPad(bytes) !== text) {
    throw new CorruptBase64Error(text.length - 1);
  }
  return new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
