// src/analyzer/rule-engine.ts
/**
 * Runs the principle checkers over one immutable TypeGraph.
 *
 * The graph is read-only, so checkers share nothing but it: each run gets a
 * private findings buffer and the results are only merged by the
 * ReportAggregator once every checker has finished.
 */

import winston from 'winston';
import { createDefaultCheckers } from './rules/index.js';
import type { CheckerOptions, PrincipleChecker } from './rules/index.js';
import type { TypeGraph } from './type-graph.js';
import { PRINCIPLES } from './types.js';
import type { CheckerRun, Principle } from './types.js';

export interface AnalyzeOptions {
    /** Subset of principles to check (default: all) */
    principles?: readonly Principle[];
}

export class RuleEngine {
    private logger: winston.Logger;
    private checkers: readonly PrincipleChecker[];

    constructor(logger: winston.Logger, checkers?: readonly PrincipleChecker[]) {
        this.logger = logger;
        this.checkers = checkers ?? createDefaultCheckers();
    }

    get principles(): Principle[] {
        return this.checkers.map(checker => checker.principle);
    }

    analyze(graph: TypeGraph, options: AnalyzeOptions = {}): CheckerRun[] {
        const enabled = new Set<Principle>(options.principles ?? PRINCIPLES);
        const runs: CheckerRun[] = [];

        for (const checker of this.checkers) {
            if (!enabled.has(checker.principle)) {
                this.logger.debug(`Skipping ${checker.principle} checker (disabled)`);
                continue;
            }

            const startTime = Date.now();
            const findings = checker.check(graph);
            const durationMs = Date.now() - startTime;

            this.logger.debug(
                `${checker.principle} (${checker.rule}) checker: ${findings.length} finding(s) in ${durationMs}ms`
            );
            runs.push({ principle: checker.principle, findings, durationMs });
        }

        return runs;
    }
}

/**
 * Create a rule engine with the five default checkers.
 */
export function createRuleEngine(logger: winston.Logger, options: CheckerOptions = {}): RuleEngine {
    return new RuleEngine(logger, createDefaultCheckers(options));
}
