#!/usr/bin/env node
/**
 * shkit CLI Entry Point
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
