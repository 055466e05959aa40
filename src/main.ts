#!/usr/bin/env node
import { createAgentProgram } from "./cli.js";

createAgentProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
