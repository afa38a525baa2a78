#!/usr/bin/env node
import { main } from "./cli.js";
import { formatError } from "./errors.js";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(formatError(error));
    process.exitCode = 1;
  },
);
