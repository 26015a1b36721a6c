import { Command } from "commander";
import { registerHashCommands } from "./commands/hash.js";
import { registerInspectCommands } from "./commands/inspect.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("argon2-hasher")
    .description("Create and verify Argon2 password hashes from a settings string")
    .version("0.1.0");

  registerHashCommands(program);
  registerInspectCommands(program);

  return program;
}
