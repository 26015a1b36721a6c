import type { Command } from "commander";
import { Hasher, matches } from "../hashing/hasher.js";
import { loadConfig } from "../config.js";
import type { ConfigOverrides } from "../config.js";
import { resolvePassword } from "./shared.js";

const SETTINGS_HELP = "Settings string, e.g. f=argon2id,s=16,k=32,m=64*1024,t=3,p=2";

export function registerHashCommands(program: Command): void {
  // ─── hash ────────────────────────────────────────────────────────────────

  program
    .command("hash")
    .description("Hash a password with the configured settings")
    .argument("[password]", "Password to hash (prompted when omitted)")
    .option("-s, --settings <settings>", SETTINGS_HELP)
    .option("--settings-file <path>", "File whose first non-comment line is the settings string")
    .action(async (password: string | undefined, options: ConfigOverrides) => {
      const config = loadConfig(options);
      const hasher = Hasher.fromSettings(config.settings);
      const plain = await resolvePassword(password);
      console.log(await hasher.create(plain));
    });

  // ─── verify ──────────────────────────────────────────────────────────────

  program
    .command("verify")
    .description("Check a password against an encoded hash")
    .argument("<hash>", "Encoded hash ($argon2id$v=19$...)")
    .argument("[password]", "Password to check (prompted when omitted)")
    .action(async (hash: string, password: string | undefined) => {
      const plain = await resolvePassword(password);
      if (await matches(plain, hash)) {
        console.log("Password matches.");
      } else {
        console.log("Password does not match.");
        process.exitCode = 1;
      }
    });

  // ─── needs-rehash ────────────────────────────────────────────────────────

  program
    .command("needs-rehash")
    .description("Report whether a hash was made with settings other than the configured ones")
    .argument("<hash>", "Encoded hash")
    .option("-s, --settings <settings>", SETTINGS_HELP)
    .option("--settings-file <path>", "File whose first non-comment line is the settings string")
    .action((hash: string, options: ConfigOverrides) => {
      const config = loadConfig(options);
      const hasher = Hasher.fromSettings(config.settings);
      console.log(hasher.needsRehash(hash) ? "yes" : "no");
    });
}
