#!/usr/bin/env node
import { createProgram } from './cli/program';
import { logger } from './logger';

createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
        logger.error({ err }, 'command failed');
        process.exitCode = 1;
    });
