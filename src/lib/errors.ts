/**
 * Error taxonomy for the identicon pipeline
 */

/**
 * Base class for every error raised by the pipeline itself
 */
export class IdenticonError extends Error {
    readonly code: string;

    constructor(code: string, message: string, options?: ErrorOptions) {
        super(`${code}: ${message}`, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * An upstream stage produced fewer elements than a downstream stage requires.
 * Integration error, never recovered from.
 */
export class InsufficientDataError extends IdenticonError {
    readonly required: number;
    readonly actual: number;

    constructor(what: string, required: number, actual: number) {
        super("ERROR-ID-01", `${what} needs at least ${required} element(s), got ${actual}.`);
        this.required = required;
        this.actual = actual;
    }
}

/**
 * Persisting the rendered image failed
 */
export class IOError extends IdenticonError {
    readonly path: string;

    constructor(path: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super("ERROR-ID-02", `Failed to write ${path}: ${reason}`, { cause });
        this.path = path;
    }
}
