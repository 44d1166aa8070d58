#!/usr/bin/env node
import { runCli } from "./src/cli.js";

runCli()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
