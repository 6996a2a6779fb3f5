#!/usr/bin/env node
import { createProgram } from "./cli.js";
import { describeError } from "./domain/errors.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`error: ${describeError(error)}`);
    process.exitCode = 1;
  });
