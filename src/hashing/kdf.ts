import { randomBytes } from "node:crypto";
import { argon2iAsync, argon2idAsync } from "@noble/hashes/argon2.js";
import { InvalidVariantError } from "./errors.js";
import { Variant } from "./types.js";

/** Argon2 format version written to and required from encoded hashes (0x13). */
export const ARGON2_VERSION = 19;

export interface KeyDerivationParams {
  variant: Variant;
  password: Uint8Array;
  salt: Uint8Array;
  iterations: number;
  memoryCost: number;
  parallelism: number;
  keyLength: number;
}

/** Deterministic for identical params. */
export type KeyDerivationFunction = (params: KeyDerivationParams) => Promise<Uint8Array>;

export type RandomSource = (size: number) => Uint8Array;

const VARIANTS: readonly string[] = Object.values(Variant);

function isVariant(value: string): value is Variant {
  return VARIANTS.includes(value);
}

/** Map a textual tag (settings `f=` or hash prefix) onto a supported variant. */
export function parseVariant(tag: string): Variant {
  if (!isVariant(tag)) {
    throw new InvalidVariantError(tag);
  }
  return tag;
}

/** Argon2 through @noble/hashes; the password may be empty. */
export const deriveKey: KeyDerivationFunction = async (params) => {
  const options = {
    t: params.iterations,
    m: params.memoryCost,
    p: params.parallelism,
    dkLen: params.keyLength,
    version: ARGON2_VERSION,
  };

  switch (params.variant) {
    case Variant.Independent:
      return argon2iAsync(params.password, params.salt, options);
    case Variant.Hybrid:
      return argon2idAsync(params.password, params.salt, options);
    default: {
      const unsupported: never = params.variant;
      throw new InvalidVariantError(String(unsupported));
    }
  }
};

export const secureRandomBytes: RandomSource = (size) => randomBytes(size);
