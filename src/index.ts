#!/usr/bin/env node
import { createProgram } from "./program.js";

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${msg}`);
    process.exitCode = 1;
  });
