#!/usr/bin/env node

/**
 * Hub Cache Verifier CLI
 *
 * Inspects, verifies and compares hub-layout model/dataset caches
 *
 * Usage:
 *   hub-cache-verify verify [options]             # Check every invariant
 *   hub-cache-verify inspect [options]            # Print the cache fingerprint
 *   hub-cache-verify compare <a> <b> [options]    # Compare two caches
 *   hub-cache-verify links <dir>                  # Find broken symlinks
 *   hub-cache-verify list [options]               # List cached repositories
 */

import { runCli } from './run.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(2);
  });
