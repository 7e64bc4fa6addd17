#!/usr/bin/env node
/**
 * freescribe-release
 * Release tooling for the FreeScribe desktop installers
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
