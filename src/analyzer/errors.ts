// src/analyzer/errors.ts
/**
 * Error hierarchy.
 *
 * - MalformedInputError: the declaration listing cannot form a valid type graph (fatal)
 * - ListingReadError: the listing file cannot be read or is not JSON (fatal)
 *
 * Checkers never throw on a valid graph; "no findings" is not an error.
 */

export interface ErrorContext {
    filePath?: string;
    [key: string]: unknown;
}

export interface SolidlintErrorJSON {
    code: string;
    message: string;
    context: ErrorContext;
    suggestion?: string;
}

export abstract class SolidlintError extends Error {
    abstract readonly code: string;
    readonly context: ErrorContext;
    readonly suggestion?: string;

    constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
        super(message);
        this.name = this.constructor.name;
        this.context = context;
        this.suggestion = suggestion;

        Object.setPrototypeOf(this, new.target.prototype);
    }

    toJSON(): SolidlintErrorJSON {
        return {
            code: this.code,
            message: this.message,
            context: this.context,
            suggestion: this.suggestion,
        };
    }
}

/**
 * Unknown type reference, inheritance cycle, duplicate declaration or a
 * listing that fails schema validation. Raised before any analysis runs.
 */
export class MalformedInputError extends SolidlintError {
    readonly code = 'MALFORMED_INPUT';
    /** Type (or `Type.method`) names responsible for the failure */
    readonly offendingNames: readonly string[];

    constructor(message: string, offendingNames: readonly string[], context: ErrorContext = {}) {
        super(message, { ...context, offendingNames: [...offendingNames] }, 'Fix the declaration listing and re-run.');
        this.offendingNames = [...offendingNames];
    }
}

export class ListingReadError extends SolidlintError {
    readonly code = 'LISTING_READ';

    constructor(message: string, filePath: string, cause?: unknown) {
        super(message, { filePath }, 'Check that the path exists and contains a JSON declaration listing.');
        if (cause !== undefined) {
            this.cause = cause;
        }
    }
}
