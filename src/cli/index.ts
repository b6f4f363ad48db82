#!/usr/bin/env node
/**
 * guest-analyzer CLI entry point
 */

import { createProgram } from "./program.js";

await createProgram().parseAsync(process.argv);
