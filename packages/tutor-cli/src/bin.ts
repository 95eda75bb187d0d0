#!/usr/bin/env node
import { runCli } from './cli/program.js';
import { processIO } from './cli/output.js';

const code = await runCli(process.argv.slice(2), {
  io: processIO(),
  cwd: process.cwd(),
  env: process.env,
});
process.exitCode = code;
