import { createInterface } from "node:readline";

// ─── Shared utilities ────────────────────────────────────────────────────

export function createPrompt(): { ask: (q: string) => Promise<string>; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return {
    ask: (q) => new Promise<string>((resolve) => rl.question(q, resolve)),
    close: () => rl.close(),
  };
}

/** Use the password given on the command line, or ask for it. */
export async function resolvePassword(password: string | undefined): Promise<string> {
  if (password !== undefined) return password;
  const prompt = createPrompt();
  try {
    return await prompt.ask("Password: ");
  } finally {
    prompt.close();
  }
}
