#!/usr/bin/env node
/**
 * @vk-enum/cli - vk-enum-to-str CLI.
 */

import { createProgram } from './program.js';

const program = createProgram((code) => process.exit(code));

program.parse();
