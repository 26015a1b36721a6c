import type { ConfigIssue } from "./validate.js";

export class InvalidVariantError extends Error {
  readonly variant: string;

  constructor(variant: string) {
    super(`Unknown or unsupported argon2 variant: "${variant}" (expected argon2i or argon2id)`);
    this.name = "InvalidVariantError";
    this.variant = variant;
  }
}

export class InvalidHashError extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(`Hash is not in the correct format: ${reason}`);
    this.name = "InvalidHashError";
    this.reason = reason;
  }
}

export class IncompatibleVersionError extends Error {
  readonly version: number;

  constructor(version: number) {
    super(`Incompatible version of argon2: ${version}`);
    this.name = "IncompatibleVersionError";
    this.version = version;
  }
}

export class InvalidConfigurationError extends Error {
  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    const detail = issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
    super(`Argon2 configuration contains invalid values (${detail})`);
    this.name = "InvalidConfigurationError";
    this.issues = issues;
  }
}

export class UnknownSettingError extends Error {
  readonly setting: string;

  constructor(setting: string) {
    super(`Unknown argon2 setting: "${setting}"`);
    this.name = "UnknownSettingError";
    this.setting = setting;
  }
}

export class MissingSettingError extends Error {
  readonly settings: readonly string[];

  constructor(settings: readonly string[]) {
    super(`Missing argon2 setting(s): ${settings.join(", ")}. All of f, s, k, m, t, p are required.`);
    this.name = "MissingSettingError";
    this.settings = settings;
  }
}

export class UnsupportedExpressionError extends Error {
  readonly token: string;
  readonly position: number;

  constructor(token: string, position: number) {
    super(`\`${token}\` unsupported in argon2 memory expression (at position ${position})`);
    this.name = "UnsupportedExpressionError";
    this.token = token;
    this.position = position;
  }
}
