#!/usr/bin/env node

/**
 * voxpipe — Command Line Interface
 *
 * speak, voices, cache and doctor commands over the speech pipeline.
 *
 * @module cli
 * @version 1.0.0
 */

import { createProgram } from './program.js';

// ═══════════════════════════════════════════════════════════════════════════
// PARSE & EXECUTE
// ═══════════════════════════════════════════════════════════════════════════

createProgram().parse(process.argv);
