#!/usr/bin/env node

import { runCli } from './cli/index.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
