#!/usr/bin/env -S npx tsx

import { runCli } from "./src/cli/run.ts"

const exitCode = await runCli(process.argv.slice(2))
process.exitCode = exitCode
