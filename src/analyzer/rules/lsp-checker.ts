// src/analyzer/rules/lsp-checker.ts
/**
 * Liskov Substitution: a subtype that answers an inherited method with an
 * unconditional "unsupported operation" failure breaks its parent's contract.
 */

import type { TypeGraph } from '../type-graph.js';
import type { Finding, MethodDeclaration, Principle } from '../types.js';
import { RULE_DEFINITIONS, createFinding } from './rule.js';
import type { PrincipleChecker } from './rule.js';

export class LspChecker implements PrincipleChecker {
    readonly principle: Principle = 'LSP';
    readonly rule = RULE_DEFINITIONS.LSP.name;

    check(graph: TypeGraph): Finding[] {
        const findings: Finding[] = [];

        for (const edge of graph.inheritanceEdges()) {
            for (const method of graph.methodsOf(edge.child)) {
                if (method.behavior !== 'throws-unsupported') continue;

                const contract = this.resolveContract(graph, edge.parent, method);
                // A contract that is itself unsupported was never promised
                if (!contract || contract.behavior === 'throws-unsupported') continue;

                const inherited = contract.owner === edge.parent ? '' : ` (inherited from ${contract.owner})`;
                findings.push(createFinding(
                    'LSP',
                    edge.child,
                    method.name,
                    `${edge.child} cannot honor ${edge.parent}'s contract for method ${method.name}${inherited}.`
                ));
            }
        }

        return findings;
    }

    /**
     * The parent's own declaration, else the nearest ancestor declaring the
     * same (name, arity).
     */
    private resolveContract(
        graph: TypeGraph,
        parent: string,
        method: MethodDeclaration
    ): MethodDeclaration | undefined {
        for (const candidate of [parent, ...graph.ancestorsOf(parent)]) {
            const declared = graph.findMethod(candidate, method.name, method.arity);
            if (declared) return declared;
        }
        return undefined;
    }
}
