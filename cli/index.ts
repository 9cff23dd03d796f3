#!/usr/bin/env node

/**
 * configsmith CLI
 */

import { createProgram } from "./program.js";

await createProgram().parseAsync();
