#!/usr/bin/env node

import { runCli } from "./cli/program.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
  process.exitCode = 1;
});

process.exitCode = await runCli(process.argv.slice(2));
