// src/analyzer/rule-engine.spec.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';
import winston from 'winston';
import { RuleEngine, createRuleEngine } from './rule-engine.js';
import { ModelBuilder } from './model-builder.js';
import { ReportAggregator } from './report-aggregator.js';
import { createDefaultCheckers, createFinding } from './rules/index.js';
import type { PrincipleChecker } from './rules/index.js';
import type { TypeGraph } from './type-graph.js';

describe('RuleEngine', () => {
    let mockLogger: winston.Logger;
    let graph: TypeGraph;

    beforeEach(() => {
        mockLogger = {
            info: vi.fn(),
            debug: vi.fn(),
            warn: vi.fn(),
            error: vi.fn(),
        } as unknown as winston.Logger;

        graph = new ModelBuilder(mockLogger).build({
            types: [
                { name: 'Bird', methods: [{ name: 'fly' }] },
                { name: 'Ostrich', extends: ['Bird'], methods: [{ name: 'fly', behavior: 'throws-unsupported' }] },
                { name: 'Video', dependencies: ['MailSender', 'VideoRepository'] },
            ],
        });
    });

    it('should run the five checkers in canonical order', () => {
        const runs = new RuleEngine(mockLogger).analyze(graph);

        expect(runs.map(r => r.principle)).toEqual(['SRP', 'OCP', 'LSP', 'ISP', 'DIP']);
        expect(runs.find(r => r.principle === 'LSP')?.findings.map(f => f.id)).toEqual(['LSP:Ostrich:fly']);
        expect(runs.find(r => r.principle === 'SRP')?.findings.map(f => f.id)).toEqual(['SRP:Video']);
        expect(runs.find(r => r.principle === 'DIP')?.findings).toEqual([]);
    });

    it('should expose the rule name of every default checker', () => {
        expect(createDefaultCheckers().map(c => c.rule)).toEqual([
            'Single Responsibility',
            'Open/Closed',
            'Liskov Substitution',
            'Interface Segregation',
            'Dependency Inversion',
        ]);
    });

    it('should log each checker run under its rule name', () => {
        new RuleEngine(mockLogger).analyze(graph, { principles: ['LSP'] });

        expect(mockLogger.debug).toHaveBeenCalledWith(
            expect.stringMatching(/^LSP \(Liskov Substitution\) checker: 1 finding\(s\) in \d+ms$/)
        );
    });

    it('should run only the selected principles', () => {
        const runs = new RuleEngine(mockLogger).analyze(graph, { principles: ['LSP'] });

        expect(runs.map(r => r.principle)).toEqual(['LSP']);
        expect(mockLogger.debug).toHaveBeenCalledWith('Skipping SRP checker (disabled)');
    });

    it('should give every checker its own findings buffer', () => {
        const runs = new RuleEngine(mockLogger).analyze(graph);
        const buffers = new Set(runs.map(r => r.findings));

        expect(buffers.size).toBe(runs.length);
    });

    it('should produce the same report whatever order the checkers run in', () => {
        const aggregator = new ReportAggregator();
        const forward = new RuleEngine(mockLogger, createDefaultCheckers());
        const backward = new RuleEngine(mockLogger, [...createDefaultCheckers()].reverse());

        expect(aggregator.aggregate(backward.analyze(graph), graph.size))
            .toEqual(aggregator.aggregate(forward.analyze(graph), graph.size));
    });

    it('should yield identical findings on repeated runs', () => {
        const engine = new RuleEngine(mockLogger);

        expect(engine.analyze(graph).map(r => r.findings)).toEqual(engine.analyze(graph).map(r => r.findings));
    });

    it('should accept custom checkers', () => {
        const stub: PrincipleChecker = {
            principle: 'OCP',
            rule: 'Open/Closed',
            check: (g: TypeGraph) => g.types().map(t => createFinding('OCP', t.name, undefined, `${t.name} checked`)),
        };

        const runs = new RuleEngine(mockLogger, [stub]).analyze(graph);

        expect(runs).toHaveLength(1);
        expect(runs[0]?.findings.map(f => f.id)).toEqual(['OCP:Bird', 'OCP:Ostrich', 'OCP:Video']);
    });

    it('should pass checker options through createRuleEngine', () => {
        const serviceGraph = new ModelBuilder(mockLogger).build({
            types: [{ name: 'RentalService', dependencies: ['Video'] }, { name: 'Video' }],
        });

        const runs = createRuleEngine(mockLogger, { inferLayers: true }).analyze(serviceGraph, { principles: ['DIP'] });

        expect(runs[0]?.findings.map(f => f.id)).toEqual(['DIP:RentalService:Video']);
    });
});
