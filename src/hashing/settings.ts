import { parseUnsigned } from "../utils/uint.js";
import { MissingSettingError, UnknownSettingError } from "./errors.js";
import { evaluate } from "./expression.js";
import { parseVariant } from "./kdf.js";
import type { HasherConfig } from "./types.js";

const SETTING_KEYS = ["f", "s", "k", "m", "t", "p"] as const;

type SettingKey = (typeof SETTING_KEYS)[number];

type MutableConfig = { -readonly [K in keyof HasherConfig]: HasherConfig[K] };

function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((known) => known === key);
}

const FIELD_BY_KEY = {
  f: "variant",
  s: "saltLength",
  k: "keyLength",
  m: "memoryCost",
  t: "iterations",
  p: "parallelism",
} as const satisfies Record<SettingKey, keyof HasherConfig>;

function hasAllFields(config: Partial<MutableConfig>): config is MutableConfig {
  return SETTING_KEYS.every((key) => config[FIELD_BY_KEY[key]] !== undefined);
}

/**
 * Parse a comma-delimited settings string such as
 * `f=argon2id,s=16,k=32,m=64*1024,t=3,p=2` into a configuration record.
 *
 * Keys may come in any order and all six are required. `m` may be an
 * arithmetic expression. Value errors propagate as thrown by the field's
 * parser; no range policy is applied beyond each field's bit width.
 */
export function parseSettings(settings: string): HasherConfig {
  const config: Partial<MutableConfig> = {};

  for (const rawToken of settings.split(",")) {
    const token = rawToken.trim();
    if (token === "") continue;
    const eq = token.indexOf("=");
    const key = eq === -1 ? token : token.slice(0, eq);
    const value = eq === -1 ? "" : token.slice(eq + 1);

    if (!isSettingKey(key)) {
      throw new UnknownSettingError(key);
    }

    // A repeated key overwrites the earlier value.
    switch (key) {
      case "f":
        config.variant = parseVariant(value);
        break;
      case "s":
        config.saltLength = parseUnsigned(value, 32);
        break;
      case "k":
        config.keyLength = parseUnsigned(value, 32);
        break;
      case "m":
        config.memoryCost = evaluate(value);
        break;
      case "t":
        config.iterations = parseUnsigned(value, 32);
        break;
      case "p":
        config.parallelism = parseUnsigned(value, 8);
        break;
    }
  }

  if (!hasAllFields(config)) {
    throw new MissingSettingError(
      SETTING_KEYS.filter((key) => config[FIELD_BY_KEY[key]] === undefined),
    );
  }
  return Object.freeze({
    variant: config.variant,
    saltLength: config.saltLength,
    keyLength: config.keyLength,
    memoryCost: config.memoryCost,
    iterations: config.iterations,
    parallelism: config.parallelism,
  });
}

/** Render a configuration record back into its canonical settings string. */
export function formatSettings(config: HasherConfig): string {
  return SETTING_KEYS.map((key) => `${key}=${config[FIELD_BY_KEY[key]]}`).join(",");
}
