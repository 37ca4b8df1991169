#!/usr/bin/env node
import { runGusConfig } from '../tools/gus-config.js';

runGusConfig(process.argv.slice(2))
  .then((status) => {
    process.exitCode = status;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
