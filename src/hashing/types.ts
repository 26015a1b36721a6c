/** Argon2 variants this package can create and verify. */
export const Variant = {
  /** Data-independent memory access. */
  Independent: "argon2i",
  /** Hybrid: data-independent first pass, data-dependent afterwards. */
  Hybrid: "argon2id",
} as const;

export type Variant = (typeof Variant)[keyof typeof Variant];

/**
 * Parameters for creating hashes. Built directly or by `parseSettings`;
 * treated as an immutable value once handed to a `Hasher`.
 */
export interface HasherConfig {
  readonly variant: Variant;
  /** (s) Bytes of random salt per hash. */
  readonly saltLength: number;
  /** (k) Bytes of derived key. */
  readonly keyLength: number;
  /** (m) Working memory in kibibytes. */
  readonly memoryCost: number;
  /** (t) Passes over memory. */
  readonly iterations: number;
  /** (p) Lanes; uint8. */
  readonly parallelism: number;
}

/** The fields of an encoded hash string. */
export interface HashRecord {
  variant: Variant;
  version: number;
  memoryCost: number;
  iterations: number;
  parallelism: number;
  salt: Uint8Array;
  key: Uint8Array;
}
