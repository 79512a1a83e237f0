/**
 * INI Store - CLI
 *
 * Command-line interface for reading and writing INI files.
 *
 * @module cli
 */

import { createProgram } from './cli/program.js';

createProgram().parse();
