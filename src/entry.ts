#!/usr/bin/env node
/**
 * bridge-assess CLI entry point.
 */
import { run } from "./cli.js";

run(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error("Fatal:", err);
    process.exit(1);
  });
