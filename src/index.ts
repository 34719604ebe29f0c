#!/usr/bin/env node
import { main } from './cli/main';

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  }
);
