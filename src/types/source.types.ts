// src/types/source.types.ts

/**
 * Thrown by the HTTP fetch layer for timeouts, connection failures and non-200 responses.
 * Adapters catch it and treat the source as empty for the run.
 */
export class SourceFetchError extends Error {
    /** Structured details for logging (url, status, axios code...). */
    details: Record<string, unknown>;

    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message);
        this.name = 'SourceFetchError';
        this.details = details;
        Object.setPrototypeOf(this, SourceFetchError.prototype);
    }
}

/**
 * Thrown when a payload cannot be decoded (bad JSON/YAML) or does not have the expected top-level shape.
 */
export class SourcePayloadError extends Error {
    details: Record<string, unknown>;

    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message);
        this.name = 'SourcePayloadError';
        this.details = details;
        Object.setPrototypeOf(this, SourcePayloadError.prototype);
    }
}

/**
 * How one source writes deadlines that recur every year.
 * `primaryToken` becomes the edition year, `secondaryToken` the edition year plus `secondaryOffset`.
 */
export interface RollingTemplateRule {
    primaryToken: string;
    secondaryToken: string;
    secondaryOffset: number;
}
