#!/usr/bin/env node
import process from "node:process";

import { runCli } from "./cli/run-main.js";
import { formatErrorMessage } from "./tracer/errors.js";

process.title = "linetrace";

runCli(process.argv).catch((err: unknown) => {
  console.error("[linetrace] Failed to start CLI:", formatErrorMessage(err));
  process.exit(1);
});
