export { Hasher, matches } from "./hashing/hasher.js";
export type { HasherDependencies } from "./hashing/hasher.js";
export { parseSettings, formatSettings } from "./hashing/settings.js";
export { evaluate, parseExpression, evaluateExpression } from "./hashing/expression.js";
export type { Expression, Operator } from "./hashing/expression.js";
export { encodeHash, decodeHash } from "./hashing/codec.js";
export { ARGON2_VERSION, deriveKey, parseVariant, secureRandomBytes } from "./hashing/kdf.js";
export type { KeyDerivationFunction, KeyDerivationParams, RandomSource } from "./hashing/kdf.js";
export { validateConfiguration, HasherConfigSchema } from "./hashing/validate.js";
export type { ConfigIssue, ConfigValidation } from "./hashing/validate.js";
export { Variant } from "./hashing/types.js";
export type { HasherConfig, HashRecord } from "./hashing/types.js";
export {
  IncompatibleVersionError,
  InvalidConfigurationError,
  InvalidHashError,
  InvalidVariantError,
  MissingSettingError,
  UnknownSettingError,
  UnsupportedExpressionError,
} from "./hashing/errors.js";
export { InvalidNumberError, NumericOverflowError } from "./utils/uint.js";
export { CorruptBase64Error } from "./utils/base64.js";
