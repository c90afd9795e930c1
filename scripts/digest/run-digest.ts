#!/usr/bin/env node

/**
 * Command-line runner for the coverage digest
 * Loads environment variables and executes one digest run
 */

import { loadEnvFiles } from '../../src/cli/env-files';
import { main } from '../../src/cli/main';

// Env files come from the working directory; the built copy runs from dist/scripts/digest
loadEnvFiles();

main(process.argv.slice(2)).then(code => {
  process.exitCode = code;
});
