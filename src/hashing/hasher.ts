import { constantTimeEqual } from "../utils/constant-time.js";
import { decodeHash, encodeHash } from "./codec.js";
import { InvalidConfigurationError } from "./errors.js";
import {
  ARGON2_VERSION,
  deriveKey as argon2,
  parseVariant,
  secureRandomBytes,
} from "./kdf.js";
import type { KeyDerivationFunction, RandomSource } from "./kdf.js";
import { parseSettings } from "./settings.js";
import type { HasherConfig } from "./types.js";
import { validateConfiguration } from "./validate.js";

export interface HasherDependencies {
  /** Defaults to Argon2 via @noble/hashes. */
  deriveKey?: KeyDerivationFunction;
  /** Defaults to crypto.randomBytes. */
  randomBytes?: RandomSource;
}

const encoder = new TextEncoder();

/**
 * Compare a plain-text password with an encoded hash.
 *
 * The key is re-derived with the parameters and key length stored in the
 * hash, then compared in constant time. A wrong password yields `false`;
 * malformed hashes and derivation failures throw.
 */
export async function matches(
  password: string,
  encoded: string,
  deriveKey: KeyDerivationFunction = argon2,
): Promise<boolean> {
  const record = decodeHash(encoded);
  const derived = await deriveKey({
    variant: record.variant,
    password: encoder.encode(password),
    salt: record.salt,
    iterations: record.iterations,
    memoryCost: record.memoryCost,
    parallelism: record.parallelism,
    keyLength: record.key.length,
  });
  return constantTimeEqual(derived, record.key);
}

/**
 * Creates Argon2 password hashes from a fixed configuration.
 *
 * The configuration is copied and frozen on construction; one instance can
 * serve concurrent `create` / `matches` calls.
 *
 * ```ts
 * const hasher = Hasher.fromSettings("f=argon2id,s=16,k=32,m=64*1024,t=3,p=2");
 * const hash = await hasher.create("correct horse");
 * await hasher.matches("correct horse", hash); // true
 * ```
 */
export class Hasher {
  readonly config: HasherConfig;
  private readonly deriveKey: KeyDerivationFunction;
  private readonly randomBytes: RandomSource;

  constructor(config: HasherConfig, deps: HasherDependencies = {}) {
    this.config = Object.freeze({ ...config });
    this.deriveKey = deps.deriveKey ?? argon2;
    this.randomBytes = deps.randomBytes ?? secureRandomBytes;
  }

  static fromSettings(settings: string, deps?: HasherDependencies): Hasher {
    return new Hasher(parseSettings(settings), deps);
  }

  /**
   * Hash a password with a fresh random salt.
   *
   * @throws InvalidConfigurationError before any randomness is drawn
   * @throws InvalidVariantError for a variant outside argon2i / argon2id
   */
  async create(password: string): Promise<string> {
    const validation = validateConfiguration(this.config);
    if (!validation.ok) {
      throw new InvalidConfigurationError(validation.issues);
    }
    // Records built outside TypeScript can carry any string here.
    const variant = parseVariant(this.config.variant);

    const salt = this.randomBytes(this.config.saltLength);
    const key = await this.deriveKey({
      variant,
      password: encoder.encode(password),
      salt,
      iterations: this.config.iterations,
      memoryCost: this.config.memoryCost,
      parallelism: this.config.parallelism,
      keyLength: this.config.keyLength,
    });

    return encodeHash({
      variant,
      version: ARGON2_VERSION,
      memoryCost: this.config.memoryCost,
      iterations: this.config.iterations,
      parallelism: this.config.parallelism,
      salt,
      key,
    });
  }

  matches(password: string, encoded: string): Promise<boolean> {
    return matches(password, encoded, this.deriveKey);
  }

  /**
   * Whether a stored hash was made with parameters other than this hasher's,
   * so it should be replaced after the next successful login.
   */
  needsRehash(encoded: string): boolean {
    const record = decodeHash(encoded);
    return (
      record.variant !== this.config.variant ||
      record.memoryCost !== this.config.memoryCost ||
      record.iterations !== this.config.iterations ||
      record.parallelism !== this.config.parallelism ||
      record.salt.length !== this.config.saltLength ||
      record.key.length !== this.config.keyLength
    );
  }
}
