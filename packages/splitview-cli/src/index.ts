#!/usr/bin/env tsx

/**
 * splitview CLI - Main entry point
 */

import { setupGlobalErrorHandlers } from './cli-wrapper';
import { createProgram } from './program';

setupGlobalErrorHandlers();

await createProgram().parseAsync(process.argv);
