#!/usr/bin/env node
import { runTextgen } from '../tools/textgen.js';

runTextgen(process.argv.slice(2))
  .then((status) => {
    process.exitCode = status;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
