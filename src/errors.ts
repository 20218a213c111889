// ============================================================================
// Errors — Failure taxonomy shared by the core and the tool layer
// ============================================================================

/** Machine-readable failure codes, mirrored in `toolError` envelopes */
export type MetabaseErrorCode =
    | 'VALIDATION_ERROR'
    | 'NOT_FOUND'
    | 'REMOTE_ERROR'
    | 'TRANSPORT_ERROR'
    | 'INTERNAL_ERROR';

/**
 * Base class for every failure the core reports.
 *
 * `operation` names the composition/discovery step that failed. It is set
 * once, by the innermost operation that sees the error (see {@link during}).
 */
export class MetabaseError extends Error {
    readonly code: MetabaseErrorCode;
    private _operation: string | undefined;

    constructor(
        code: MetabaseErrorCode,
        message: string,
        options?: { operation?: string; cause?: unknown },
    ) {
        super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = 'MetabaseError';
        this.code = code;
        this._operation = options?.operation;
    }

    get operation(): string | undefined {
        return this._operation;
    }

    /** Tag the error with the operation it surfaced from, unless already tagged. */
    during(operation: string): this {
        this._operation ??= operation;
        return this;
    }

    /** Message prefixed with the operation name, when known. */
    describe(): string {
        return this._operation ? `${this._operation}: ${this.message}` : this.message;
    }
}

/** A caller-supplied input is missing or malformed. No remote call was made. */
export class ValidationError extends MetabaseError {
    readonly field: string | undefined;

    constructor(message: string, options?: { field?: string; operation?: string }) {
        super('VALIDATION_ERROR', message, options);
        this.name = 'ValidationError';
        this.field = options?.field;
    }
}

/** A requested tab or dashcard does not exist in the fetched document. */
export class NotFoundError extends MetabaseError {
    readonly resource: string;
    readonly id: string | number;
    readonly available: readonly (string | number)[];

    constructor(
        resource: string,
        id: string | number,
        available: readonly (string | number)[],
        options?: { operation?: string },
    ) {
        const listing = available.length > 0 ? available.join(', ') : 'none';
        super('NOT_FOUND', `${resource} ${id} not found (available: ${listing})`, options);
        this.name = 'NotFoundError';
        this.resource = resource;
        this.id = id;
        this.available = Object.freeze([...available]);
    }
}

/** Metabase answered with a non-success status. The body is kept uninterpreted. */
export class GatewayError extends MetabaseError {
    readonly status: number;
    readonly method: string;
    readonly path: string;
    readonly body: string;

    constructor(init: { status: number; method: string; path: string; body: string }) {
        super('REMOTE_ERROR', `API request failed with status ${init.status}: ${init.body}`);
        this.name = 'GatewayError';
        this.status = init.status;
        this.method = init.method;
        this.path = init.path;
        this.body = init.body;
    }
}

/** The request never produced a response (network failure, timeout, bad JSON). */
export class TransportError extends MetabaseError {
    readonly method: string;
    readonly path: string;

    constructor(method: string, path: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super('TRANSPORT_ERROR', `${method} ${path} failed: ${reason}`, { cause });
        this.name = 'TransportError';
        this.method = method;
        this.path = path;
    }
}

/**
 * Run `fn`, tagging any failure with `operation`.
 *
 * Errors that are not a {@link MetabaseError} (a malformed document tripping
 * a parser, a bug) are wrapped as `INTERNAL_ERROR` so callers always receive
 * the taxonomy above.
 */
export async function withOperation<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
        return await fn();
    } catch (err) {
        if (err instanceof MetabaseError) throw err.during(operation);
        const message = err instanceof Error ? err.message : String(err);
        throw new MetabaseError('INTERNAL_ERROR', message, { operation, cause: err });
    }
}
