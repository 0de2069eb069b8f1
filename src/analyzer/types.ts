// src/analyzer/types.ts

// --- Declaration Model ---

/**
 * Kind of a declared type. Only single class inheritance is modelled;
 * a type may implement any number of interfaces.
 */
export type TypeKind = 'class' | 'interface';

/**
 * Architectural layer marker. `service` marks business logic (the
 * "service-layer" types the DIP checker looks at).
 */
export type Layer = 'service' | 'technical' | 'unspecified';

/**
 * Declared runtime disposition of a method body. Checkers read these tags
 * instead of executing or parsing real code.
 */
export type BodyBehavior =
    | 'normal'              // Performs its contract
    | 'throws-unsupported'  // Unconditionally signals an unsupported operation
    | 'no-op'               // Empty body
    | 'type-switch';        // Branches on a type/category tag to select behavior

export const BODY_BEHAVIORS = ['normal', 'throws-unsupported', 'no-op', 'type-switch'] as const;

export interface MethodDeclaration {
    /** Name of the type that owns the method */
    owner: string;
    name: string;
    /** Parameter count */
    arity: number;
    /** Declared return kind, free text (e.g. "void", "number") */
    returns: string;
    behavior: BodyBehavior;
}

export interface FieldDeclaration {
    name: string;
    type: string;
}

/**
 * `from` depends on `to`. `to` may name a type that is absent from the
 * listing (an external library type).
 */
export interface DependencyEdge {
    from: string;
    to: string;
    /** True when `from` constructs `to` itself (`new` in its constructor) */
    instantiates: boolean;
}

/**
 * `child` extends or implements `parent`.
 */
export interface InheritanceEdge {
    child: string;
    parent: string;
}

export interface TypeDeclaration {
    name: string;
    kind: TypeKind;
    layer: Layer;
    fields: readonly FieldDeclaration[];
    methods: readonly MethodDeclaration[];
    /** Direct supertypes, by name */
    supertypes: readonly string[];
    dependencies: readonly DependencyEdge[];
}

// --- Findings ---

export type Principle = 'SRP' | 'OCP' | 'LSP' | 'ISP' | 'DIP';

/**
 * Canonical principle order (the order the principles are usually taught in).
 * Report sorting uses the principle name, not this order.
 */
export const PRINCIPLES: readonly Principle[] = ['SRP', 'OCP', 'LSP', 'ISP', 'DIP'];

export type Severity = 'low' | 'medium' | 'high';

/**
 * A single reported structural issue tied to one design principle.
 */
export interface Finding {
    /** Stable identifier: `PRINCIPLE:Type` or `PRINCIPLE:Type:member` */
    id: string;
    principle: Principle;
    /** Human-readable rule name */
    rule: string;
    severity: Severity;
    typeName: string;
    /** Method name, or the dependency target for DIP findings */
    memberName?: string;
    message: string;
    suggestion: string;
}

/**
 * Output of one checker over one graph.
 */
export interface CheckerRun {
    principle: Principle;
    findings: Finding[];
    durationMs: number;
}

export interface ReportSummary {
    total: number;
    typesAnalyzed: number;
    byPrinciple: Record<Principle, number>;
    bySeverity: Record<Severity, number>;
}

export interface Report {
    findings: Finding[];
    summary: ReportSummary;
}
