#!/usr/bin/env node
import { runHeadless } from "./cli.js";

process.exitCode = await runHeadless(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
});
