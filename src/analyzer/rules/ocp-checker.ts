// src/analyzer/rules/ocp-checker.ts
/**
 * Open/Closed: a method tagged `type-switch` selects behavior by branching
 * on a category tag, so every new category means editing it.
 */

import type { TypeGraph } from '../type-graph.js';
import type { Finding, Principle } from '../types.js';
import { RULE_DEFINITIONS, createFinding } from './rule.js';
import type { PrincipleChecker } from './rule.js';

export class OcpChecker implements PrincipleChecker {
    readonly principle: Principle = 'OCP';
    readonly rule = RULE_DEFINITIONS.OCP.name;

    check(graph: TypeGraph): Finding[] {
        const findings: Finding[] = [];

        for (const type of graph.types()) {
            // An interface with registered implementers already dispatches per category
            if (type.kind === 'interface' && graph.subtypesOf(type.name).length > 0) continue;

            for (const method of type.methods) {
                if (method.behavior !== 'type-switch') continue;
                findings.push(createFinding(
                    'OCP',
                    type.name,
                    method.name,
                    `${type.name}.${method.name} branches on type; consider polymorphic dispatch via an interface.`
                ));
            }
        }

        return findings;
    }
}
