/**
 * Property tests for the analysis pipeline over generated declaration listings.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import winston from 'winston';
import { AnalyzerService } from '../../src/analyzer/analyzer-service.js';
import { MalformedInputError } from '../../src/analyzer/errors.js';
import { ModelBuilder } from '../../src/analyzer/model-builder.js';
import { ReportAggregator, compareFindings } from '../../src/analyzer/report-aggregator.js';
import { RuleEngine } from '../../src/analyzer/rule-engine.js';
import { createDefaultCheckers } from '../../src/analyzer/rules/index.js';
import type { DeclarationListingInput } from '../../src/analyzer/declaration-schema.js';
import { BODY_BEHAVIORS, PRINCIPLES } from '../../src/analyzer/types.js';

// ============================================================
// Configuration
// ============================================================

const PROPERTY_CONFIG = {
    numRuns: 100,
    verbose: false,
};

const silentLogger = winston.createLogger({ silent: true });

// ============================================================
// Arbitrary Generators
// ============================================================

const METHOD_NAMES = ['fly', 'swim', 'playRandomAd', 'computeEarnings'];
const DEPENDENCY_TARGETS = ['VideoRepository', 'MailSender', 'PaymentClient', 'Clock', 'T0', 'T1', 'T2'];

const arbitraryTypeSeed = fc.record({
    isInterface: fc.boolean(),
    parentPicks: fc.array(fc.nat({ max: 20 }), { maxLength: 3 }),
    methods: fc.array(
        fc.record({
            name: fc.constantFrom(...METHOD_NAMES),
            behavior: fc.constantFrom(...BODY_BEHAVIORS),
        }),
        { maxLength: 3 }
    ),
    dependencies: fc.array(
        fc.record({
            target: fc.constantFrom(...DEPENDENCY_TARGETS),
            instantiates: fc.boolean(),
        }),
        { maxLength: 3 }
    ),
    layer: fc.constantFrom('service' as const, 'technical' as const, 'unspecified' as const),
});

type TypeSeed = typeof arbitraryTypeSeed extends fc.Arbitrary<infer T> ? T : never;

/**
 * Types are named T0..Tn; a type only inherits from lower indices, so the
 * listing is acyclic, and parents are filtered to satisfy the kind rules.
 */
function toListing(seeds: TypeSeed[]): DeclarationListingInput {
    const kinds = seeds.map(seed => (seed.isInterface ? 'interface' as const : 'class' as const));

    const types = seeds.map((seed, index) => {
        const name = `T${index}`;
        const candidates = index === 0 ? [] : [...new Set(seed.parentPicks.map(pick => pick % index))];

        const parents: number[] = [];
        let hasClassParent = false;
        for (const candidate of candidates) {
            if (kinds[candidate] === 'interface') {
                parents.push(candidate);
            } else if (kinds[index] === 'class' && !hasClassParent) {
                parents.push(candidate);
                hasClassParent = true;
            }
        }

        const methods = [...new Map(seed.methods.map(m => [m.name, m])).values()];

        return {
            name,
            kind: kinds[index],
            layer: seed.layer,
            extends: parents.map(parent => `T${parent}`),
            methods,
            dependencies: seed.dependencies,
        };
    });

    return { types };
}

const arbitraryListing = fc.array(arbitraryTypeSeed, { minLength: 1, maxLength: 8 }).map(toListing);

// ============================================================
// Properties
// ============================================================

describe('analysis pipeline properties', () => {
    it('should build a graph for every generated listing', () => {
        fc.assert(
            fc.property(arbitraryListing, listing => {
                const graph = new ModelBuilder(silentLogger).build(listing);
                expect(graph.size).toBe(listing.types.length);
            }),
            PROPERTY_CONFIG
        );
    });

    it('should give the same findings when a checker runs twice', () => {
        fc.assert(
            fc.property(arbitraryListing, listing => {
                const graph = new ModelBuilder(silentLogger).build(listing);
                for (const checker of createDefaultCheckers()) {
                    expect(checker.check(graph)).toEqual(checker.check(graph));
                }
            }),
            PROPERTY_CONFIG
        );
    });

    it('should produce the same report on repeated runs', () => {
        const service = new AnalyzerService(silentLogger);
        fc.assert(
            fc.property(arbitraryListing, listing => {
                expect(service.analyzeListing(listing)).toEqual(service.analyzeListing(listing));
            }),
            PROPERTY_CONFIG
        );
    });

    it('should not depend on the order of type records', () => {
        const service = new AnalyzerService(silentLogger);
        fc.assert(
            fc.property(arbitraryListing, listing => {
                const reversed: DeclarationListingInput = { types: [...listing.types].reverse() };
                expect(service.analyzeListing(reversed)).toEqual(service.analyzeListing(listing));
            }),
            PROPERTY_CONFIG
        );
    });

    it('should not depend on the order checkers run in', () => {
        const checkers = createDefaultCheckers();
        fc.assert(
            fc.property(
                arbitraryListing,
                fc.shuffledSubarray(checkers, { minLength: checkers.length, maxLength: checkers.length }),
                (listing, shuffled) => {
                    const graph = new ModelBuilder(silentLogger).build(listing);
                    const aggregator = new ReportAggregator();

                    const canonical = aggregator.aggregate(new RuleEngine(silentLogger, checkers).analyze(graph), graph.size);
                    const permuted = aggregator.aggregate(new RuleEngine(silentLogger, shuffled).analyze(graph), graph.size);

                    expect(permuted).toEqual(canonical);
                }
            ),
            PROPERTY_CONFIG
        );
    });

    it('should return sorted, unique findings about declared types', () => {
        const service = new AnalyzerService(silentLogger);
        fc.assert(
            fc.property(arbitraryListing, listing => {
                const report = service.analyzeListing(listing);
                const declared = new Set(listing.types.map(t => t.name));
                const ids = report.findings.map(f => f.id);

                expect(new Set(ids).size).toBe(ids.length);
                expect([...report.findings].sort(compareFindings)).toEqual(report.findings);
                for (const finding of report.findings) {
                    expect(declared.has(finding.typeName)).toBe(true);
                }

                const perPrinciple = PRINCIPLES.reduce((sum, p) => sum + report.summary.byPrinciple[p], 0);
                expect(perPrinciple).toBe(report.summary.total);
                expect(report.summary.total).toBe(report.findings.length);
            }),
            PROPERTY_CONFIG
        );
    });

    it('should reject every inheritance ring', () => {
        fc.assert(
            fc.property(fc.integer({ min: 1, max: 6 }), fc.boolean(), (size, asInterfaces) => {
                const names = Array.from({ length: size }, (_, i) => `T${i}`);
                const listing = {
                    types: names.map((name, i) => ({
                        name,
                        kind: asInterfaces ? 'interface' : 'class',
                        extends: [names[(i + 1) % size]],
                    })),
                };

                let caught: unknown;
                try {
                    new ModelBuilder(silentLogger).build(listing);
                } catch (error) {
                    caught = error;
                }

                expect(caught).toBeInstanceOf(MalformedInputError);
                if (caught instanceof MalformedInputError) {
                    expect([...caught.offendingNames].sort()).toEqual(names);
                }
            }),
            PROPERTY_CONFIG
        );
    });
});
