#!/usr/bin/env node
import { EXIT_FAILURE, EXIT_INTERRUPTED, runCli } from './cli';

process.on('SIGINT', () => {
  console.error('\n\nMonitoring interrupted by user.');
  process.exit(EXIT_INTERRUPTED);
});

process.on('SIGTERM', () => {
  process.exit(EXIT_FAILURE);
});

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('Fatal error:', error);
    process.exit(EXIT_FAILURE);
  });
