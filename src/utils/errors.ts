import type { EntityKind } from '../types/index.js';

/**
 * Base class for every error the curator core raises on purpose.
 */
export class CuratorError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CuratorError';
    }
}

/**
 * Individual schema or field problem behind a ValidationError.
 */
export interface ValidationIssue {
    path: (string | number)[];
    message: string;
}

/**
 * Malformed input: bad WKT, bad bibliographic entry, missing year,
 * exhausted slug candidates, bad annotation key. The operation is aborted.
 */
export class ValidationError extends CuratorError {
    public readonly field: string | undefined;
    public readonly issues: ValidationIssue[];

    constructor(message: string, options: { field?: string; issues?: ValidationIssue[]; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'ValidationError';
        this.field = options.field;
        this.issues = options.issues ?? [];
    }

    /**
     * Format the error and its issues for display.
     */
    format(): string {
        const lines = [this.message];
        for (const issue of this.issues) {
            const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            lines.push(`  - ${path}: ${issue.message}`);
        }
        return lines.join('\n');
    }
}

/**
 * A request the user should correct. Returned to the presentation layer
 * as a no-op message rather than thrown.
 */
export class UserError extends CuratorError {
    constructor(message: string) {
        super(message);
        this.name = 'UserError';
    }
}

/**
 * Lookup by id, slug or DOI found nothing.
 */
export class NotFoundError extends CuratorError {
    constructor(
        public readonly kind: EntityKind | 'revision',
        public readonly key: string | number
    ) {
        super(`No ${kind} with key ${JSON.stringify(key)}`);
        this.name = 'NotFoundError';
    }
}

/**
 * Duplicate alias, slug, ORCID or annotation key.
 */
export class UniqueConstraintViolation extends CuratorError {
    constructor(
        message: string,
        public readonly constraint: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'UniqueConstraintViolation';
    }
}

/**
 * True when `error` is a SQLite unique-constraint failure raised by better-sqlite3.
 */
export function isSqliteUniqueError(error: unknown): boolean {
    return (
        error instanceof Error &&
        'code' in error &&
        (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
    );
}

/**
 * Run a write and translate a driver-level unique failure into UniqueConstraintViolation.
 */
export function guardUnique<T>(constraint: string, message: string, fn: () => T): T {
    try {
        return fn();
    } catch (error) {
        if (isSqliteUniqueError(error)) {
            throw new UniqueConstraintViolation(message, constraint, { cause: error });
        }
        throw error;
    }
}
