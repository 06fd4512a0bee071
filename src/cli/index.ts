#!/usr/bin/env node
import { runCli } from './program.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error(`❌ Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
