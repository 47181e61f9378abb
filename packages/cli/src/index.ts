#!/usr/bin/env tsx
import { EXIT_CODES } from "@askshell/errors";
import { main } from "./cli.js";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exit(EXIT_CODES.SOFTWARE);
  },
);
