// src/cli/analyze.ts
import { Command } from 'commander';
import fs from 'fs/promises';
import path from 'path';
import winston from 'winston';
import { AnalyzerService } from '../analyzer/analyzer-service.js';
import { SolidlintError } from '../analyzer/errors.js';
import { renderJson, renderText } from '../analyzer/report-aggregator.js';
import { PRINCIPLES } from '../analyzer/types.js';
import type { Principle } from '../analyzer/types.js';
import config from '../config/index.js';
import type { ReportFormat } from '../config/index.js';
import { createContextLogger } from '../utils/logger.js';

const logger = createContextLogger('AnalyzeCmd');

export const EXIT_CLEAN = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_ERROR = 2;

export interface AnalyzeCommandOptions {
    format?: string;
    principles?: string;
    inferLayers?: boolean;
    output?: string;
}

/**
 * Where the report goes when no --output file is given.
 */
export interface ReportSink {
    write(chunk: string): unknown;
}

export function parseFormat(value: string | undefined): ReportFormat {
    const format = (value ?? config.defaultFormat).toLowerCase();
    if (format === 'text' || format === 'json') {
        return format;
    }
    throw new Error(`Unknown format '${value}'. Expected one of: text, json`);
}

export function parsePrinciples(value: string | undefined): Principle[] | undefined {
    if (value === undefined) return undefined;

    const selected: Principle[] = [];
    for (const item of value.split(',').map(p => p.trim().toUpperCase()).filter(p => p.length > 0)) {
        const principle = PRINCIPLES.find(p => p === item);
        if (!principle) {
            throw new Error(`Unknown principle '${item}'. Expected any of: ${PRINCIPLES.join(', ')}`);
        }
        if (!selected.includes(principle)) {
            selected.push(principle);
        }
    }
    if (selected.length === 0) {
        throw new Error('--principles needs at least one principle');
    }
    return selected;
}

/**
 * Runs one analysis and returns the process exit code:
 * 0 no findings, 1 findings, 2 malformed input or bad options.
 */
export async function runAnalyzeCommand(
    target: string,
    options: AnalyzeCommandOptions,
    sink: ReportSink = process.stdout,
    log: winston.Logger = logger
): Promise<number> {
    let format: ReportFormat;
    let principles: Principle[] | undefined;
    try {
        format = parseFormat(options.format);
        principles = parsePrinciples(options.principles);
    } catch (error: unknown) {
        log.error(error instanceof Error ? error.message : String(error));
        return EXIT_ERROR;
    }

    try {
        const service = new AnalyzerService(log);
        const report = await service.analyzeFile(target, {
            principles,
            inferLayers: options.inferLayers ?? config.inferLayers,
            technicalSuffixes: config.technicalSuffixes,
            serviceLayerSuffixes: config.serviceLayerSuffixes,
        });

        const rendered = format === 'json' ? renderJson(report) : renderText(report);
        if (options.output) {
            const outputPath = path.resolve(options.output);
            await fs.writeFile(outputPath, rendered, 'utf-8');
            log.info(`Report written to ${outputPath}`);
        } else {
            sink.write(rendered);
        }

        return report.summary.total > 0 ? EXIT_FINDINGS : EXIT_CLEAN;
    } catch (error: unknown) {
        if (error instanceof SolidlintError) {
            log.error(error.message, { code: error.code });
            return EXIT_ERROR;
        }
        log.error(`Analysis failed: ${error instanceof Error ? error.message : String(error)}`, {
            stack: error instanceof Error ? error.stack : undefined,
        });
        return EXIT_ERROR;
    }
}

export function registerAnalyzeCommand(program: Command): void {
    program
        .command('analyze <listing>')
        .description('Check a JSON declaration listing for SOLID design-principle violations')
        .option('-f, --format <format>', `Report format: text | json (default: ${config.defaultFormat})`)
        .option('-p, --principles <list>', `Comma-separated subset of principles to check (${PRINCIPLES.join(',')})`)
        .option('--infer-layers', 'Treat unmarked *Service/*Manager/... types as service-layer')
        .option('-o, --output <file>', 'Write the report to a file instead of stdout')
        .action(async (listing: string, options: AnalyzeCommandOptions) => {
            logger.debug(`Received analyze command for listing: ${listing}`);
            process.exitCode = await runAnalyzeCommand(listing, options);
        });
}
