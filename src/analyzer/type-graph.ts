// src/analyzer/type-graph.ts
/**
 * Immutable class/interface graph produced by the ModelBuilder.
 *
 * Supertype references are weak: edges hold names that resolve against the
 * type table. Every collection handed out is frozen and sorted by name, so
 * checkers iterating the graph see the same order on every run.
 */

import type {
    DependencyEdge,
    InheritanceEdge,
    MethodDeclaration,
    TypeDeclaration,
} from './types.js';

const byName = (a: { name: string }, b: { name: string }): number => compareOrdinal(a.name, b.name);

/**
 * Locale-independent string comparison.
 */
export function compareOrdinal(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export class TypeGraph {
    private readonly typeTable: ReadonlyMap<string, TypeDeclaration>;
    private readonly subtypeIndex: ReadonlyMap<string, readonly string[]>;
    private readonly sortedTypes: readonly TypeDeclaration[];
    private readonly inheritance: readonly InheritanceEdge[];
    private readonly dependencies: readonly DependencyEdge[];

    /**
     * Callers are expected to have validated the declarations already
     * (see ModelBuilder); the constructor only indexes and freezes them.
     */
    constructor(declarations: readonly TypeDeclaration[]) {
        const table = new Map<string, TypeDeclaration>();
        for (const declaration of [...declarations].sort(byName)) {
            table.set(declaration.name, freezeDeclaration(declaration));
        }
        this.typeTable = table;
        this.sortedTypes = Object.freeze([...table.values()]);

        const subtypes = new Map<string, string[]>();
        const inheritance: InheritanceEdge[] = [];
        const dependencies: DependencyEdge[] = [];
        for (const type of this.sortedTypes) {
            for (const parent of type.supertypes) {
                inheritance.push(Object.freeze({ child: type.name, parent }));
                const children = subtypes.get(parent) ?? [];
                children.push(type.name);
                subtypes.set(parent, children);
            }
            dependencies.push(...type.dependencies);
        }
        this.subtypeIndex = new Map(
            [...subtypes.entries()].map(
                ([parent, children]): [string, readonly string[]] => [parent, Object.freeze(children.sort(compareOrdinal))]
            )
        );
        this.inheritance = Object.freeze(inheritance);
        this.dependencies = Object.freeze(dependencies);
    }

    get size(): number {
        return this.sortedTypes.length;
    }

    types(): readonly TypeDeclaration[] {
        return this.sortedTypes;
    }

    getType(name: string): TypeDeclaration | undefined {
        return this.typeTable.get(name);
    }

    hasType(name: string): boolean {
        return this.typeTable.has(name);
    }

    isInterface(name: string): boolean {
        return this.typeTable.get(name)?.kind === 'interface';
    }

    isClass(name: string): boolean {
        return this.typeTable.get(name)?.kind === 'class';
    }

    methodsOf(name: string): readonly MethodDeclaration[] {
        return this.typeTable.get(name)?.methods ?? [];
    }

    /**
     * Methods are matched by (owner, name, arity).
     */
    findMethod(typeName: string, methodName: string, arity: number): MethodDeclaration | undefined {
        return this.methodsOf(typeName).find(m => m.name === methodName && m.arity === arity);
    }

    supertypesOf(name: string): readonly string[] {
        return this.typeTable.get(name)?.supertypes ?? [];
    }

    /**
     * Direct subtypes (implementers, for an interface).
     */
    subtypesOf(name: string): readonly string[] {
        return this.subtypeIndex.get(name) ?? [];
    }

    /**
     * All transitive supertypes, breadth first: nearest ancestors come first.
     */
    ancestorsOf(name: string): string[] {
        const seen = new Set<string>([name]);
        const ordered: string[] = [];
        let frontier = [...this.supertypesOf(name)];

        while (frontier.length > 0) {
            const next: string[] = [];
            for (const parent of frontier) {
                if (seen.has(parent)) continue;
                seen.add(parent);
                ordered.push(parent);
                next.push(...this.supertypesOf(parent));
            }
            frontier = next;
        }

        return ordered;
    }

    dependenciesOf(name: string): readonly DependencyEdge[] {
        return this.typeTable.get(name)?.dependencies ?? [];
    }

    inheritanceEdges(): readonly InheritanceEdge[] {
        return this.inheritance;
    }

    dependencyEdges(): readonly DependencyEdge[] {
        return this.dependencies;
    }
}

function freezeDeclaration(declaration: TypeDeclaration): TypeDeclaration {
    return Object.freeze({
        ...declaration,
        fields: Object.freeze(declaration.fields.map(f => Object.freeze({ ...f }))),
        methods: Object.freeze(
            [...declaration.methods]
                .sort((a, b) => compareOrdinal(a.name, b.name) || a.arity - b.arity)
                .map(m => Object.freeze({ ...m }))
        ),
        supertypes: Object.freeze([...declaration.supertypes].sort(compareOrdinal)),
        dependencies: Object.freeze(
            [...declaration.dependencies]
                .sort((a, b) => compareOrdinal(a.to, b.to))
                .map(d => Object.freeze({ ...d }))
        ),
    });
}
