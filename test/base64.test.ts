import { describe, it, expect } from "vitest";
import {
  CorruptBase64Error,
  decodeBase64NoPad,
  encodeBase64NoPad,
} from "../src/utils/base64.js";

const SALT_B64 = "oOT8PmX+YLmj8wRveAP0Cg";

function offsetOf(fn: () => unknown): number {
  try {
    fn();
  } catch (err) {
    if (err instanceof CorruptBase64Error) return err.offset;
    throw err;
  }
  throw new Error("expected CorruptBase64Error");
}

describe("encodeBase64NoPad", () => {
  it("drops padding", () => {
    expect(encodeBase64NoPad(Buffer.from("foo"))).toBe("Zm9v");
    expect(encodeBase64NoPad(Buffer.from("fo"))).toBe("Zm8");
    expect(encodeBase64NoPad(Buffer.from("f"))).toBe("Zg");
  });

  it("encodes an empty array as an empty string", () => {
    expect(encodeBase64NoPad(new Uint8Array(0))).toBe("");
  });

  it("respects the view window of a subarray", () => {
    const bytes = Buffer.from("xfoox");
    expect(encodeBase64NoPad(bytes.subarray(1, 4))).toBe("Zm9v");
  });

  it("uses the standard alphabet (+ and /)", () => {
    expect(encodeBase64NoPad(new Uint8Array([0xfb, 0xff]))).toBe("+/8");
  });
});

describe("decodeBase64NoPad", () => {
  it("decodes unpadded input", () => {
    expect(Array.from(decodeBase64NoPad("Zg"))).toEqual([0x66]);
    expect(Buffer.from(decodeBase64NoPad("Zm9v")).toString()).toBe("foo");
  });

  it("decodes a 16-byte salt and re-encodes it unchanged", () => {
    const salt = decodeBase64NoPad(SALT_B64);
    expect(salt.length).toBe(16);
    expect(encodeBase64NoPad(salt)).toBe(SALT_B64);
  });

  it("rejects characters outside the alphabet at their offset", () => {
    expect(offsetOf(() => decodeBase64NoPad("Zm!v"))).toBe(2);
    expect(offsetOf(() => decodeBase64NoPad("Zm9v Zg"))).toBe(4);
  });

  it("rejects padding", () => {
    expect(offsetOf(() => decodeBase64NoPad("Zg=="))).toBe(2);
  });

  it("rejects the url-safe alphabet", () => {
    expect(offsetOf(() => decodeBase64NoPad("-_8"))).toBe(0);
  });

  it("rejects a length that leaves a single trailing character", () => {
    expect(offsetOf(() => decodeBase64NoPad("Zm9vY"))).toBe(4);
    // The salt above with one character removed.
    expect(offsetOf(() => decodeBase64NoPad("oOT8PmX+YLmj8wReAP0Cg"))).toBe(20);
  });

  it("rejects non-zero trailing bits", () => {
    expect(offsetOf(() => decodeBase64NoPad("Zh"))).toBe(1);
  });
});
