import type { Work } from '../types/index.js';

/**
 * HTTP error with classification. One failed attempt against the API.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * The attempt budget for a single fetch is spent.
 */
export class RetryExhaustedError extends Error {
    constructor(
        public readonly url: string,
        public readonly attempts: number,
        cause?: unknown
    ) {
        super(`Giving up on ${url} after ${attempts} attempts`, { cause });
        this.name = 'RetryExhaustedError';
    }
}

/**
 * The caller aborted the request (or a sleep between attempts).
 */
export class RequestAbortedError extends Error {
    constructor(public readonly url?: string) {
        super(url ? `Request aborted: ${url}` : 'Request aborted');
        this.name = 'AbortError';
    }
}

/**
 * Invalid configuration or filter composition. Raised before any request is issued.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * A hop failed. Carries what was collected before the failing hop so the
 * caller can restart from the last completed layer.
 */
export class ExpansionError extends Error {
    /** Records collected before the failed hop (seed + completed layers) */
    readonly collected: number;

    constructor(
        public readonly hop: number,
        public readonly works: Work[],
        public readonly layers: Work[][],
        cause: unknown
    ) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Expansion failed at hop ${hop} with ${works.length} records collected: ${reason}`, { cause });
        this.name = 'ExpansionError';
        this.collected = works.length;
    }
}
