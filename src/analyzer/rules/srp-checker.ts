// src/analyzer/rules/srp-checker.ts
/**
 * Single Responsibility, approximated structurally: dependencies are
 * categorised by name suffix (`*Repository` → persistence, `*Sender` →
 * messaging, anything unmatched → domain). A type whose dependencies span
 * more than one category is reported.
 *
 * This is a proxy for a semantic judgement ("does this mix business and
 * technical concerns?") and will miss types whose collaborators are not
 * named by convention.
 */

import {
    DEFAULT_MESSAGING_SUFFIXES,
    DEFAULT_PERSISTENCE_SUFFIXES,
} from '../../config/index.js';
import { compareOrdinal } from '../type-graph.js';
import type { TypeGraph } from '../type-graph.js';
import type { Finding, Principle } from '../types.js';
import { RULE_DEFINITIONS, createFinding } from './rule.js';
import type { PrincipleChecker } from './rule.js';

export const DOMAIN_CATEGORY = 'domain';

export const DEFAULT_TECHNICAL_SUFFIXES: Record<string, string[]> = {
    persistence: DEFAULT_PERSISTENCE_SUFFIXES,
    messaging: DEFAULT_MESSAGING_SUFFIXES,
};

export interface SrpCheckerOptions {
    /** Suffix families per technical category */
    technicalSuffixes?: Record<string, string[]>;
}

export class SrpChecker implements PrincipleChecker {
    readonly principle: Principle = 'SRP';
    readonly rule = RULE_DEFINITIONS.SRP.name;
    private readonly suffixes: ReadonlyArray<{ category: string; suffix: string }>;

    constructor(options: SrpCheckerOptions = {}) {
        const families = options.technicalSuffixes ?? DEFAULT_TECHNICAL_SUFFIXES;
        // Longest suffix first, so `Repository` wins over a shorter overlapping one
        this.suffixes = Object.entries(families)
            .flatMap(([category, suffixes]) => suffixes.map(suffix => ({ category, suffix })))
            .sort((a, b) => b.suffix.length - a.suffix.length || compareOrdinal(a.suffix, b.suffix));
    }

    /**
     * Category of a dependency name, or `domain` when no suffix matches.
     */
    categorize(dependencyName: string): string {
        const match = this.suffixes.find(({ suffix }) => dependencyName.endsWith(suffix));
        return match ? match.category : DOMAIN_CATEGORY;
    }

    check(graph: TypeGraph): Finding[] {
        const findings: Finding[] = [];

        for (const type of graph.types()) {
            const groups = new Map<string, string[]>();
            for (const dependency of type.dependencies) {
                const category = this.categorize(dependency.to);
                const names = groups.get(category) ?? [];
                names.push(dependency.to);
                groups.set(category, names);
            }
            if (groups.size < 2) continue;

            const categories = [...groups.keys()].sort(compareOrdinal);
            const headline = groups.has(DOMAIN_CATEGORY)
                ? 'mixes business and technical responsibilities'
                : 'mixes unrelated technical responsibilities';
            const parts = categories.map(category => `${category} (${(groups.get(category) ?? []).join(', ')})`);

            findings.push(createFinding(
                'SRP',
                type.name,
                undefined,
                `${type.name} ${headline}: ${parts.join('; ')}.`
            ));
        }

        return findings;
    }
}
