#!/usr/bin/env node

import { HoardError } from "../core/errors.js";
import { runCli } from "./cli.js";

const EXIT_GENERAL_ERROR = 1;
const EXIT_CONFIG_ERROR = 2;

runCli().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`fail: ${message}`);
  process.exitCode =
    error instanceof HoardError && error.code.startsWith("CONFIG_")
      ? EXIT_CONFIG_ERROR
      : EXIT_GENERAL_ERROR;
});
