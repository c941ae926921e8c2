#!/usr/bin/env node
/**
 * Executable entry point.
 */

import { run } from "./main.js";

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Unexpected error:", err);
    process.exitCode = 1;
  }
);
