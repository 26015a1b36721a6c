import type { Command } from "commander";
import { decodeHash } from "../hashing/codec.js";
import { evaluate } from "../hashing/expression.js";
import { formatSettings, parseSettings } from "../hashing/settings.js";
import { encodeBase64NoPad } from "../utils/base64.js";
import { loadConfig } from "../config.js";

export function registerInspectCommands(program: Command): void {
  // ─── settings ────────────────────────────────────────────────────────────

  program
    .command("settings")
    .description("Parse a settings string and show the resulting configuration")
    .argument("[settings]", "Settings string (defaults to the configured one)")
    .action((settings: string | undefined) => {
      const config = loadConfig({ settings });
      const record = parseSettings(config.settings);
      console.log(JSON.stringify(record, null, 2));
      console.log(`Canonical: ${formatSettings(record)}`);
      if (config.source !== "flag") {
        console.log(`Source:    ${config.source}`);
      }
    });

  // ─── memory ──────────────────────────────────────────────────────────────

  program
    .command("memory")
    .description("Evaluate a memory-cost expression such as 64*1024")
    .argument("<expression>", "Expression over integers with + - * / and parentheses")
    .action((expression: string) => {
      console.log(`${evaluate(expression)} KiB`);
    });

  // ─── decode ──────────────────────────────────────────────────────────────

  program
    .command("decode")
    .description("Show the fields of an encoded hash")
    .argument("<hash>", "Encoded hash")
    .action((hash: string) => {
      const record = decodeHash(hash);
      console.log(
        JSON.stringify(
          {
            variant: record.variant,
            version: record.version,
            memoryCost: record.memoryCost,
            iterations: record.iterations,
            parallelism: record.parallelism,
            salt: encodeBase64NoPad(record.salt),
            saltLength: record.salt.length,
            key: encodeBase64NoPad(record.key),
            keyLength: record.key.length,
          },
          null,
          2,
        ),
      );
    });
}
