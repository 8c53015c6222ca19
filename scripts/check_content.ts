#!/usr/bin/env node
import { runCli } from './lib/cli.js';

runCli()
  .then((result) => {
    if (!result.ok) {
      process.exit(1);
    }
  })
  .catch((error) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
