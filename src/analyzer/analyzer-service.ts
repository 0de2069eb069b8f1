// src/analyzer/analyzer-service.ts
/**
 * Orchestrates one run: load listing → build graph → run checkers → aggregate.
 */

import fs from 'fs/promises';
import path from 'path';
import winston from 'winston';
import { ListingReadError } from './errors.js';
import { createModelBuilder } from './model-builder.js';
import { ReportAggregator } from './report-aggregator.js';
import { createRuleEngine } from './rule-engine.js';
import type { RuleEngine } from './rule-engine.js';
import type { CheckerOptions } from './rules/index.js';
import type { Principle, Report } from './types.js';
import { createContextLogger } from '../utils/logger.js';

export interface AnalysisOptions extends CheckerOptions {
    principles?: readonly Principle[];
}

export class AnalyzerService {
    private logger: winston.Logger;

    constructor(logger: winston.Logger = createContextLogger('AnalyzerService')) {
        this.logger = logger;
    }

    /**
     * Reads and JSON-parses a listing file. Schema validation happens in the ModelBuilder.
     */
    async loadListing(filePath: string): Promise<unknown> {
        const absolutePath = path.resolve(filePath);
        let content: string;
        try {
            content = await fs.readFile(absolutePath, 'utf-8');
        } catch (error: unknown) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ListingReadError(`Cannot read declaration listing ${absolutePath}: ${reason}`, absolutePath, error);
        }

        try {
            return JSON.parse(content);
        } catch (error: unknown) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ListingReadError(`Declaration listing ${absolutePath} is not valid JSON: ${reason}`, absolutePath, error);
        }
    }

    /**
     * Runs build → analyze → report on an in-memory listing.
     */
    analyzeListing(listing: unknown, options: AnalysisOptions = {}): Report {
        const graph = createModelBuilder(this.logger).build(listing);
        this.logger.info(`Type graph built with ${graph.size} types.`);

        const engine: RuleEngine = createRuleEngine(this.logger, {
            technicalSuffixes: options.technicalSuffixes,
            inferLayers: options.inferLayers,
            serviceLayerSuffixes: options.serviceLayerSuffixes,
        });
        const runs = engine.analyze(graph, { principles: options.principles });

        const report = new ReportAggregator().aggregate(runs, graph.size);
        this.logger.info(`Analysis finished: ${report.summary.total} finding(s).`);
        return report;
    }

    async analyzeFile(filePath: string, options: AnalysisOptions = {}): Promise<Report> {
        this.logger.info(`Analyzing declaration listing: ${filePath}`);
        const listing = await this.loadListing(filePath);
        return this.analyzeListing(listing, options);
    }
}
