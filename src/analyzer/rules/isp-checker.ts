// src/analyzer/rules/isp-checker.ts
/**
 * Interface Segregation: an implementer that stubs out an interface method
 * (throws or does nothing) while a sibling implements it for real is being
 * forced to depend on a method it does not use.
 */

import { compareOrdinal } from '../type-graph.js';
import type { TypeGraph } from '../type-graph.js';
import type { Finding, MethodDeclaration, Principle } from '../types.js';
import { RULE_DEFINITIONS, createFinding } from './rule.js';
import type { PrincipleChecker } from './rule.js';

export class IspChecker implements PrincipleChecker {
    readonly principle: Principle = 'ISP';
    readonly rule = RULE_DEFINITIONS.ISP.name;

    check(graph: TypeGraph): Finding[] {
        const findings: Finding[] = [];
        const emitted = new Set<string>();

        for (const iface of graph.types()) {
            if (iface.kind !== 'interface') continue;

            const implementers = graph.subtypesOf(iface.name).filter(name => graph.isClass(name));
            if (implementers.length < 2) continue;

            for (const method of this.interfaceMethods(graph, iface.name)) {
                const overrides = implementers
                    .map(name => graph.findMethod(name, method.name, method.arity))
                    .filter((m): m is MethodDeclaration => m !== undefined);

                if (!overrides.some(m => m.behavior === 'normal')) continue;

                for (const override of overrides) {
                    if (override.behavior !== 'throws-unsupported' && override.behavior !== 'no-op') continue;

                    const finding = createFinding(
                        'ISP',
                        override.owner,
                        method.name,
                        `${override.owner} is forced to implement ${iface.name}.${method.name} which it does not use.`,
                        override.behavior === 'no-op' ? 'low' : 'medium'
                    );
                    if (emitted.has(finding.id)) continue;
                    emitted.add(finding.id);
                    findings.push(finding);
                }
            }
        }

        return findings;
    }

    /**
     * Own methods plus those of every super-interface, keyed by (name, arity).
     */
    private interfaceMethods(graph: TypeGraph, name: string): MethodDeclaration[] {
        const methods = new Map<string, MethodDeclaration>();
        for (const owner of [name, ...graph.ancestorsOf(name)]) {
            if (!graph.isInterface(owner)) continue;
            for (const method of graph.methodsOf(owner)) {
                const key = `${method.name}/${method.arity}`;
                if (!methods.has(key)) {
                    methods.set(key, method);
                }
            }
        }
        return [...methods.values()].sort((a, b) => compareOrdinal(a.name, b.name) || a.arity - b.arity);
    }
}
