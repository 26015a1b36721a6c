import { decodeBase64NoPad, encodeBase64NoPad } from "../utils/base64.js";
import { parseUnsigned } from "../utils/uint.js";
import { IncompatibleVersionError, InvalidHashError } from "./errors.js";
import { ARGON2_VERSION, parseVariant } from "./kdf.js";
import type { HashRecord } from "./types.js";

// $<variant>$v=<version>$m=<memory>,t=<iterations>,p=<parallelism>$<salt>$<key>
//
// Salt and key are unpadded standard base64. Other systems store and compare
// these strings, so the layout must not drift.

const FIELD_DELIMITER = "$";
const FIELD_COUNT = 6;

const VERSION_FIELD = /^v=(.*)$/;
const PARAMS_FIELD = /^m=([^,]*),t=([^,]*),p=([^,]*)$/;

export function encodeHash(record: HashRecord): string {
  return [
    "",
    record.variant,
    `v=${record.version}`,
    `m=${record.memoryCost},t=${record.iterations},p=${record.parallelism}`,
    encodeBase64NoPad(record.salt),
    encodeBase64NoPad(record.key),
  ].join(FIELD_DELIMITER);
}

/**
 * Split an encoded hash into its fields. Pure parsing: no key derivation.
 *
 * Checks run in field order, so a hash with both an unknown variant and a
 * bad version reports the variant.
 */
export function decodeHash(encoded: string): HashRecord {
  const fields = encoded.split(FIELD_DELIMITER);
  if (fields.length !== FIELD_COUNT) {
    throw new InvalidHashError(
      `expected ${FIELD_COUNT} "${FIELD_DELIMITER}"-delimited fields, found ${fields.length}`,
    );
  }
  const [leading, variantField, versionField, paramsField, saltField, keyField] = fields;
  if (leading !== "") {
    throw new InvalidHashError(`must start with "${FIELD_DELIMITER}"`);
  }
  const emptyIndex = fields.indexOf("", 1);
  if (emptyIndex !== -1) {
    throw new InvalidHashError(`field ${emptyIndex} is empty`);
  }

  const variant = parseVariant(variantField);

  const versionMatch = VERSION_FIELD.exec(versionField);
  if (!versionMatch) {
    throw new InvalidHashError(`version field "${versionField}" is not v=<number>`);
  }
  const version = parseUnsigned(versionMatch[1], 32);
  if (version !== ARGON2_VERSION) {
    throw new IncompatibleVersionError(version);
  }

  const paramsMatch = PARAMS_FIELD.exec(paramsField);
  if (!paramsMatch) {
    throw new InvalidHashError(`parameter field "${paramsField}" is not m=<n>,t=<n>,p=<n>`);
  }
  const memoryCost = parseUnsigned(paramsMatch[1], 32);
  const iterations = parseUnsigned(paramsMatch[2], 32);
  const parallelism = parseUnsigned(paramsMatch[3], 8);

  return {
    variant,
    version,
    memoryCost,
    iterations,
    parallelism,
    salt: decodeBase64NoPad(saltField),
    key: decodeBase64NoPad(keyField),
  };
}
