#!/usr/bin/env node
// src/cli/index.ts
import { Command } from 'commander';
import { registerAnalyzeCommand } from './analyze.js';
import { createContextLogger } from '../utils/logger.js';

const logger = createContextLogger('CLI');

export function createProgram(): Command {
    const program = new Command();
    program
        .name('solidlint')
        .description('Report SOLID design-principle violations in a class/interface declaration listing')
        .version('0.1.0');

    registerAnalyzeCommand(program);
    return program;
}

createProgram().parseAsync(process.argv).catch((error: unknown) => {
    logger.error(`Command failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 2;
});
