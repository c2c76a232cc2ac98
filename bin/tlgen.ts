#!/usr/bin/env node
// bin/tlgen.ts
// tlgen CLI entry point
//
// Run:  npx tsx bin/tlgen.ts generate --schema api.tl --out src/tl

import { runCli } from "./tlgen-cli-lib";

process.exitCode = runCli(process.argv.slice(2), {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
});
