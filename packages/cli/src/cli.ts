#!/usr/bin/env node
/**
 * declsort executable
 */

import { createProgram } from './index.js';

await createProgram().parseAsync(process.argv);
