// src/analyzer/declaration-schema.ts
/**
 * zod schema for the JSON declaration listing.
 *
 * Methods, supertypes and dependencies may be nested inside a type record or
 * given in the top-level `methods`, `inheritance` and `dependencies` arrays.
 */

import { z } from 'zod';
import { BODY_BEHAVIORS } from './types.js';

const identifier = z.string().trim().min(1, 'must be a non-empty name');

export const BodyBehaviorSchema = z.enum(BODY_BEHAVIORS);

const methodFields = {
    name: identifier,
    arity: z.number().int().nonnegative().default(0),
    returns: z.string().default('void'),
    behavior: BodyBehaviorSchema.default('normal'),
};

export const NestedMethodSchema = z.object(methodFields);

export const MethodRecordSchema = z.object({
    owner: identifier,
    ...methodFields,
});

export const FieldSchema = z.object({
    name: identifier,
    type: z.string().default('unknown'),
});

export const NestedDependencySchema = z.union([
    identifier.transform(target => ({ target, instantiates: false })),
    z.object({
        target: identifier,
        instantiates: z.boolean().default(false),
    }),
]);

export const DependencyRecordSchema = z.object({
    from: identifier,
    to: identifier,
    instantiates: z.boolean().default(false),
});

export const InheritanceRecordSchema = z.object({
    child: identifier,
    parent: identifier,
});

export const TypeRecordSchema = z.object({
    name: identifier,
    kind: z.enum(['class', 'interface']).default('class'),
    layer: z.enum(['service', 'technical', 'unspecified']).default('unspecified'),
    extends: z.array(identifier).default([]),
    implements: z.array(identifier).default([]),
    fields: z.array(FieldSchema).default([]),
    methods: z.array(NestedMethodSchema).default([]),
    dependencies: z.array(NestedDependencySchema).default([]),
});

export const DeclarationListingSchema = z.object({
    types: z.array(TypeRecordSchema),
    methods: z.array(MethodRecordSchema).default([]),
    inheritance: z.array(InheritanceRecordSchema).default([]),
    dependencies: z.array(DependencyRecordSchema).default([]),
});

/** Listing as written in the file (defaults optional) */
export type DeclarationListingInput = z.input<typeof DeclarationListingSchema>;
/** Listing after validation, with every default filled in */
export type DeclarationListing = z.output<typeof DeclarationListingSchema>;

/**
 * Formats zod issues as `path: message` lines.
 */
export function describeIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
    });
}
