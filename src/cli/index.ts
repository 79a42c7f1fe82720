#!/usr/bin/env node
/**
 * hub CLI entry point
 */

import { runCli } from "./run";

process.exitCode = runCli(process.argv.slice(2), {
  env: process.env,
  cwd: process.cwd(),
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
});
