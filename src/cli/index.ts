#!/usr/bin/env node

/**
 * Annotation generator CLI entry point.
 *
 * This is the main entry point for the 'annotate' CLI command.
 */

import { runCli } from './main.js';
import { withErrorHandling } from './utils/errorHandling.js';

withErrorHandling(() => runCli(process.argv.slice(2)));
