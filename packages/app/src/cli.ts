#!/usr/bin/env node

/**
 * CLI entry point for the levelscope command
 *
 * Thin wrapper around start.ts so the binary and the library share one implementation
 */

import { main } from './start.js';

await main();
