// src/analyzer/model-builder.ts
/**
 * Converts a declaration listing into an immutable TypeGraph.
 * Fails fast with MalformedInputError, naming the offending types.
 */

import winston from 'winston';
import { DeclarationListingSchema, describeIssues } from './declaration-schema.js';
import type { DeclarationListing } from './declaration-schema.js';
import { MalformedInputError } from './errors.js';
import { TypeGraph, compareOrdinal } from './type-graph.js';
import type {
    DependencyEdge,
    FieldDeclaration,
    MethodDeclaration,
    TypeDeclaration,
    TypeKind,
} from './types.js';

interface PendingType {
    name: string;
    kind: TypeKind;
    layer: TypeDeclaration['layer'];
    fields: FieldDeclaration[];
    methods: MethodDeclaration[];
    supertypes: Set<string>;
    dependencies: Map<string, DependencyEdge>;
}

type Color = 'white' | 'grey' | 'black';

interface DfsFrame {
    name: string;
    nextParent: number;
}

export class ModelBuilder {
    private logger: winston.Logger;

    constructor(logger: winston.Logger) {
        this.logger = logger;
    }

    /**
     * Validates `input` against the listing schema and the graph invariants,
     * then builds the graph.
     */
    build(input: unknown): TypeGraph {
        const parsed = DeclarationListingSchema.safeParse(input);
        if (!parsed.success) {
            const issues = describeIssues(parsed.error);
            throw new MalformedInputError(
                `Declaration listing failed validation:\n  ${issues.join('\n  ')}`,
                parsed.error.issues.map(issue => issue.path.join('.') || '(root)')
            );
        }

        const listing = parsed.data;
        const pending = this.collectTypes(listing);
        this.collectMethods(listing, pending);
        this.collectInheritance(listing, pending);
        this.collectDependencies(listing, pending);
        this.detectInheritanceCycles(pending);
        this.checkKindRules(pending);

        const declarations: TypeDeclaration[] = [...pending.values()].map(type => ({
            name: type.name,
            kind: type.kind,
            layer: type.layer,
            fields: type.fields,
            methods: type.methods,
            supertypes: [...type.supertypes],
            dependencies: [...type.dependencies.values()],
        }));

        const graph = new TypeGraph(declarations);
        this.logger.debug(
            `Built type graph: ${graph.size} types, ${graph.inheritanceEdges().length} inheritance edges, ` +
            `${graph.dependencyEdges().length} dependency edges`
        );
        return graph;
    }

    private collectTypes(listing: DeclarationListing): Map<string, PendingType> {
        const pending = new Map<string, PendingType>();
        const duplicates = new Set<string>();

        for (const record of listing.types) {
            if (pending.has(record.name)) {
                duplicates.add(record.name);
                continue;
            }
            pending.set(record.name, {
                name: record.name,
                kind: record.kind,
                layer: record.layer,
                fields: record.fields.map(field => ({ name: field.name, type: field.type })),
                methods: record.methods.map(method => ({ owner: record.name, ...method })),
                supertypes: new Set([...record.extends, ...record.implements]),
                dependencies: new Map(),
            });
        }

        if (duplicates.size > 0) {
            const names = [...duplicates].sort(compareOrdinal);
            throw new MalformedInputError(`Duplicate type declaration: ${names.join(', ')}`, names);
        }

        return pending;
    }

    private collectMethods(listing: DeclarationListing, pending: Map<string, PendingType>): void {
        const unknownOwners = new Set<string>();
        for (const record of listing.methods) {
            const owner = pending.get(record.owner);
            if (!owner) {
                unknownOwners.add(record.owner);
                continue;
            }
            owner.methods.push({ ...record });
        }
        if (unknownOwners.size > 0) {
            const names = [...unknownOwners].sort(compareOrdinal);
            throw new MalformedInputError(`Method owner does not exist: ${names.join(', ')}`, names);
        }

        const duplicates: string[] = [];
        for (const type of pending.values()) {
            const seen = new Set<string>();
            for (const method of type.methods) {
                const key = `${method.name}/${method.arity}`;
                if (seen.has(key)) {
                    duplicates.push(`${type.name}.${key}`);
                }
                seen.add(key);
            }
        }
        if (duplicates.length > 0) {
            duplicates.sort(compareOrdinal);
            throw new MalformedInputError(`Duplicate method declaration: ${duplicates.join(', ')}`, duplicates);
        }
    }

    private collectInheritance(listing: DeclarationListing, pending: Map<string, PendingType>): void {
        const unknown = new Set<string>();

        for (const edge of listing.inheritance) {
            const child = pending.get(edge.child);
            if (!child) {
                unknown.add(edge.child);
                continue;
            }
            child.supertypes.add(edge.parent);
        }

        for (const type of pending.values()) {
            for (const parent of type.supertypes) {
                if (!pending.has(parent)) {
                    unknown.add(parent);
                }
            }
        }

        if (unknown.size > 0) {
            const names = [...unknown].sort(compareOrdinal);
            throw new MalformedInputError(`Unknown type referenced in inheritance: ${names.join(', ')}`, names);
        }
    }

    private collectDependencies(listing: DeclarationListing, pending: Map<string, PendingType>): void {
        const add = (type: PendingType, to: string, instantiates: boolean): void => {
            const existing = type.dependencies.get(to);
            type.dependencies.set(to, {
                from: type.name,
                to,
                instantiates: instantiates || (existing?.instantiates ?? false),
            });
        };

        for (const record of listing.types) {
            const type = pending.get(record.name);
            if (!type) continue;
            for (const dependency of record.dependencies) {
                add(type, dependency.target, dependency.instantiates);
            }
        }

        const unknownSources = new Set<string>();
        for (const edge of listing.dependencies) {
            const type = pending.get(edge.from);
            if (!type) {
                unknownSources.add(edge.from);
                continue;
            }
            add(type, edge.to, edge.instantiates);
        }

        if (unknownSources.size > 0) {
            const names = [...unknownSources].sort(compareOrdinal);
            throw new MalformedInputError(`Unknown type referenced as dependency source: ${names.join(', ')}`, names);
        }
    }

    /**
     * Depth-first traversal with white/grey/black colouring over an explicit
     * frame stack, so chain depth is bounded by the heap rather than the call
     * stack. Reaching a grey node closes a cycle; a self edge is a cycle of
     * length one.
     */
    private detectInheritanceCycles(pending: Map<string, PendingType>): void {
        const adjacency = new Map<string, string[]>();
        for (const [name, type] of pending) {
            adjacency.set(name, [...type.supertypes].sort(compareOrdinal));
        }

        const color = new Map<string, Color>();

        for (const root of [...pending.keys()].sort(compareOrdinal)) {
            if ((color.get(root) ?? 'white') !== 'white') continue;

            const frames: DfsFrame[] = [{ name: root, nextParent: 0 }];
            color.set(root, 'grey');

            while (frames.length > 0) {
                const frame = frames[frames.length - 1];
                const parents = adjacency.get(frame.name) ?? [];

                if (frame.nextParent >= parents.length) {
                    color.set(frame.name, 'black');
                    frames.pop();
                    continue;
                }

                const parent = parents[frame.nextParent];
                frame.nextParent++;

                const state = color.get(parent) ?? 'white';
                if (state === 'grey') {
                    const path = frames.map(f => f.name);
                    const cycle = [...path.slice(path.indexOf(parent)), parent];
                    throw new MalformedInputError(
                        `Inheritance cycle detected: ${cycle.join(' -> ')}`,
                        [...new Set(cycle)]
                    );
                }
                if (state === 'white') {
                    color.set(parent, 'grey');
                    frames.push({ name: parent, nextParent: 0 });
                }
            }
        }
    }

    private checkKindRules(pending: Map<string, PendingType>): void {
        for (const type of [...pending.values()].sort((a, b) => compareOrdinal(a.name, b.name))) {
            const parents = [...type.supertypes].sort(compareOrdinal);
            const classParents = parents.filter(parent => pending.get(parent)?.kind === 'class');

            if (type.kind === 'interface' && classParents.length > 0) {
                throw new MalformedInputError(
                    `Interface ${type.name} cannot extend class ${classParents.join(', ')}`,
                    [type.name, ...classParents]
                );
            }
            if (type.kind === 'class' && classParents.length > 1) {
                throw new MalformedInputError(
                    `Class ${type.name} extends more than one class: ${classParents.join(', ')}`,
                    [type.name, ...classParents]
                );
            }
        }
    }
}

/**
 * Create a model builder.
 */
export function createModelBuilder(logger: winston.Logger): ModelBuilder {
    return new ModelBuilder(logger);
}
