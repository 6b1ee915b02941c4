/**
 * Error types for the syntax package language server.
 *
 * These never reach the host: the registry catches them, logs them and
 * carries on with what it could index.
 */

/**
 * Base error class for engine failures.
 */
export class SyntaxDevError extends Error {
    public override readonly cause?: Error;

    constructor(message: string, cause?: Error) {
        super(message);
        this.name = 'SyntaxDevError';
        if (cause) {
            this.cause = cause;
        }
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }

    /**
     * Messages of this error and its causes, outermost first.
     */
    get chain(): string {
        const messages: string[] = [this.message];
        let current: unknown = this.cause;
        while (current instanceof Error) {
            messages.push(current.message);
            current = current.cause;
        }
        return messages.join(' -> ');
    }
}

/**
 * A syntax file could not be read or parsed.
 */
export class IndexingError extends SyntaxDevError {
    constructor(public readonly filePath: string, message: string, cause?: Error) {
        super(`Failed to index ${filePath}: ${message}`, cause);
        this.name = 'IndexingError';
    }
}

/**
 * Syntax files reference each other in a cycle.
 */
export class EmbedCycleError extends SyntaxDevError {
    /** Resource paths along the cycle; the first one repeats at the end */
    public readonly cycle: readonly string[];

    constructor(cycle: readonly string[]) {
        super(`Circular syntax reference: ${cycle.join(' -> ')}`);
        this.name = 'EmbedCycleError';
        this.cycle = cycle;
    }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
