#!/usr/bin/env node
/**
 * tasklane CLI entry point.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
