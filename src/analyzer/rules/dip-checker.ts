// src/analyzer/rules/dip-checker.ts
/**
 * Dependency Inversion: a service-layer type that depends on a concrete
 * class (rather than an interface) is coupled to a low-level detail.
 */

import { DEFAULT_SERVICE_LAYER_SUFFIXES } from '../../config/index.js';
import type { TypeGraph } from '../type-graph.js';
import type { Finding, Principle, TypeDeclaration } from '../types.js';
import { RULE_DEFINITIONS, createFinding } from './rule.js';
import type { PrincipleChecker } from './rule.js';

export interface DipCheckerOptions {
    /** Treat `unspecified` types named like a service as service-layer */
    inferLayers?: boolean;
    serviceLayerSuffixes?: string[];
}

export class DipChecker implements PrincipleChecker {
    readonly principle: Principle = 'DIP';
    readonly rule = RULE_DEFINITIONS.DIP.name;
    private readonly inferLayers: boolean;
    private readonly serviceLayerSuffixes: readonly string[];

    constructor(options: DipCheckerOptions = {}) {
        this.inferLayers = options.inferLayers ?? false;
        this.serviceLayerSuffixes = options.serviceLayerSuffixes ?? DEFAULT_SERVICE_LAYER_SUFFIXES;
    }

    isServiceLayer(type: TypeDeclaration): boolean {
        if (type.layer === 'service') return true;
        if (!this.inferLayers || type.layer !== 'unspecified') return false;
        return this.serviceLayerSuffixes.some(suffix => type.name.length > suffix.length && type.name.endsWith(suffix));
    }

    check(graph: TypeGraph): Finding[] {
        const findings: Finding[] = [];

        for (const type of graph.types()) {
            if (!this.isServiceLayer(type)) continue;

            for (const dependency of type.dependencies) {
                // Undeclared targets are external and cannot be classified
                if (!graph.isClass(dependency.to)) continue;

                const constructs = dependency.instantiates ? ` and constructs it itself` : '';
                findings.push(createFinding(
                    'DIP',
                    type.name,
                    dependency.to,
                    `${type.name} depends on concrete class ${dependency.to}${constructs} instead of an abstraction.`,
                    dependency.instantiates ? 'high' : 'medium'
                ));
            }
        }

        return findings;
    }
}
