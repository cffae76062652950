#!/usr/bin/env node
/**
 * bin/sciregistry.ts — Entry point for the `sciregistry` CLI command.
 */

import { createProgram } from '../commands/index.js';

await createProgram().parseAsync();
