#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { runCli } from "./commands.js";

const code = runCli(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text + "\n"),
  stderr: (text) => process.stderr.write(text + "\n"),
  readStdin: () => readFileSync("/dev/stdin", "utf-8"),
  env: process.env,
});
process.exitCode = code;
