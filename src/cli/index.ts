#!/usr/bin/env node
import 'dotenv/config';

import { loadConfig } from './config';
import { runPrimes } from './report';

function main() {
  try {
    const config = loadConfig();
    runPrimes(config);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

main();
