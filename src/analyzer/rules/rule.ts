// src/analyzer/rules/rule.ts
/**
 * Shared checker contract and rule definitions.
 */

import type { TypeGraph } from '../type-graph.js';
import type { Finding, Principle, Severity } from '../types.js';

/**
 * A checker is a total, pure function of the graph: it keeps no state
 * between calls and writes only into the array it returns.
 */
export interface PrincipleChecker {
    readonly principle: Principle;
    /** Human-readable rule name, e.g. `Liskov Substitution` */
    readonly rule: string;
    check(graph: TypeGraph): Finding[];
}

// =============================================================================
// Rule Definitions
// =============================================================================

interface RuleDefinition {
    principle: Principle;
    name: string;
    description: string;
    suggestion: string;
    defaultSeverity: Severity;
}

export const RULE_DEFINITIONS: Record<Principle, RuleDefinition> = {
    SRP: {
        principle: 'SRP',
        name: 'Single Responsibility',
        description: 'A type should have only one reason to change.',
        suggestion: 'Split the type so that business rules and each technical concern live in separate classes.',
        defaultSeverity: 'medium',
    },
    OCP: {
        principle: 'OCP',
        name: 'Open/Closed',
        description: 'Types should be open for extension but closed for modification.',
        suggestion: 'Introduce an interface with one implementation per category and dispatch polymorphically.',
        defaultSeverity: 'low',
    },
    LSP: {
        principle: 'LSP',
        name: 'Liskov Substitution',
        description: 'A subtype must be usable wherever its supertype is expected.',
        suggestion: 'Remove the inheritance relation or move the method to a narrower supertype.',
        defaultSeverity: 'high',
    },
    ISP: {
        principle: 'ISP',
        name: 'Interface Segregation',
        description: 'Clients should not be forced to depend on methods they do not use.',
        suggestion: 'Split the interface into smaller role interfaces and implement only the ones that apply.',
        defaultSeverity: 'medium',
    },
    DIP: {
        principle: 'DIP',
        name: 'Dependency Inversion',
        description: 'High-level modules should depend on abstractions, not on concrete low-level modules.',
        suggestion: 'Depend on an interface and receive the implementation through the constructor.',
        defaultSeverity: 'medium',
    },
};

/**
 * Stable identifier used for dedup and test assertions.
 */
export function findingId(principle: Principle, typeName: string, memberName?: string): string {
    return memberName === undefined ? `${principle}:${typeName}` : `${principle}:${typeName}:${memberName}`;
}

export function createFinding(
    principle: Principle,
    typeName: string,
    memberName: string | undefined,
    message: string,
    severity?: Severity
): Finding {
    const def = RULE_DEFINITIONS[principle];
    return {
        id: findingId(principle, typeName, memberName),
        principle,
        rule: def.name,
        severity: severity ?? def.defaultSeverity,
        typeName,
        ...(memberName !== undefined ? { memberName } : {}),
        message,
        suggestion: def.suggestion,
    };
}
