#!/usr/bin/env node

/**
 * deppaths CLI entry point
 */

import { createCli } from './interface/cli/index.js';
import { closeLogger } from './shared/logger.js';

const program = createCli();
await program.parseAsync(process.argv);
await closeLogger();
