#!/usr/bin/env node

import { hideBin } from "yargs/helpers";

import { runCli } from "./runner";

async function main(): Promise<void> {
  process.exitCode = await runCli(hideBin(process.argv));
}

main().catch((error) => {
  console.error("ci: error: unhandled error:", error);
  process.exit(1);
});
