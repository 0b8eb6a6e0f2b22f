#!/usr/bin/env node
import { createProgram } from './program.js';
import { getLogger } from '../utils/logger.js';

createProgram()
    .parseAsync()
    .catch((error: unknown) => {
        getLogger().error({ err: error }, 'Command failed');
        process.exit(1);
    });
