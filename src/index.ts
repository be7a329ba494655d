#!/usr/bin/env node
import { runCli } from "./cli/run.js";

async function main() {
  const exitCode = await runCli(process.argv.slice(2));
  process.exitCode = exitCode;
}

main().catch((error) => {
  console.error("\nAn error occurred:", error);
  process.exitCode = 1;
});
