import pLimit from 'p-limit';
import { getLogger } from './logger.js';
import { HttpError, RequestAbortedError, RetryExhaustedError } from './errors.js';

/**
 * Transient block from the API: wait this long and retry.
 */
const BLOCKED_WAIT_MS = 5000;

/**
 * Used when a 429 carries no usable Retry-After header.
 */
const DEFAULT_RETRY_AFTER_MS = 2000;

/**
 * Query parameters. Undefined values are left out of the URL.
 */
export type QueryParams = Record<string, string | number | undefined>;

/**
 * Minimal fetch signature the client depends on. The global `fetch` satisfies it.
 */
export type FetchLike = (
    url: string,
    init: { signal: AbortSignal; headers: Record<string, string> }
) => Promise<Response>;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * HTTP client options.
 */
export interface HttpClientOptions {
    /** Base URL every request path is resolved against */
    baseUrl?: string;
    /** Contact email, sent as `mailto` for the OpenAlex polite pool */
    mailto?: string;
    /** Maximum requests in flight across all calls on this client */
    concurrency?: number;
    /** Failed attempts allowed per call before giving up (429/403 excluded) */
    maxAttempts?: number;
    /** Backoff after failed attempt n (0-based) is backoffBase^n + backoffFloor seconds */
    backoffBase?: number;
    backoffFloor?: number;
    /** Cap on 429/403 retries per call */
    maxThrottleRetries?: number;
    /** Per-attempt timeout in milliseconds */
    timeout?: number;
    /** Pause after each successful response, drawn from [min, max] ms */
    jitterMinMs?: number;
    jitterMaxMs?: number;
    version?: string;
    fetch?: FetchLike;
    sleep?: SleepFn;
    random?: () => number;
}

export interface RequestOptions {
    signal?: AbortSignal;
}

type AttemptOutcome =
    | { kind: 'data'; data: unknown }
    | { kind: 'throttled'; status: number; waitMs: number };

/**
 * Sleep for the specified number of milliseconds.
 * Rejects with `RequestAbortedError` if the signal fires first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new RequestAbortedError());
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(new RequestAbortedError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Concurrency-bounded JSON client with retry and backoff.
 *
 * Every call holds one slot of the shared limiter from its first attempt
 * until it resolves or fails, so at most `concurrency` requests are ever
 * outstanding no matter how many callers share the instance.
 */
export class HttpClient {
    private readonly limiter: ReturnType<typeof pLimit>;
    private requestCount = 0;
    private readonly baseUrl: string;
    private readonly mailto?: string;
    private readonly maxAttempts: number;
    private readonly backoffBase: number;
    private readonly backoffFloor: number;
    private readonly maxThrottleRetries: number;
    private readonly timeout: number;
    private readonly jitterMinMs: number;
    private readonly jitterMaxMs: number;
    private readonly userAgent: string;
    private readonly fetchImpl: FetchLike;
    private readonly sleepImpl: SleepFn;
    private readonly random: () => number;

    constructor(options: HttpClientOptions = {}) {
        const concurrency = options.concurrency ?? 30;
        this.limiter = pLimit(concurrency);
        this.baseUrl = options.baseUrl ?? 'https://api.openalex.org';
        this.mailto = options.mailto;
        this.maxAttempts = options.maxAttempts ?? 5;
        this.backoffBase = options.backoffBase ?? 1.5;
        this.backoffFloor = options.backoffFloor ?? 0.5;
        this.maxThrottleRetries = options.maxThrottleRetries ?? 50;
        this.timeout = options.timeout ?? 30000;
        this.jitterMinMs = options.jitterMinMs ?? 50;
        this.jitterMaxMs = options.jitterMaxMs ?? 150;
        this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
        this.sleepImpl = options.sleep ?? sleep;
        this.random = options.random ?? Math.random;

        const version = options.version ?? '0.1.0';
        this.userAgent = this.mailto
            ? `hopgraph/${version} (mailto:${this.mailto})`
            : `hopgraph/${version}`;

        if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
            throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
        }
    }

    /**
     * GET `path` with query parameters and return the parsed JSON body.
     *
     * @throws RetryExhaustedError when every attempt failed
     * @throws RequestAbortedError when `options.signal` fires
     */
    async getJson(path: string, params: QueryParams = {}, options: RequestOptions = {}): Promise<unknown> {
        const url = this.buildUrl(path, params);
        return this.limiter(() => this.requestWithRetry(url, options.signal));
    }

    /**
     * Number of HTTP attempts issued, retries included.
     */
    getRequestCount(): number {
        return this.requestCount;
    }

    resetCounts(): void {
        this.requestCount = 0;
    }

    buildUrl(path: string, params: QueryParams): string {
        const search = new URLSearchParams();
        for (const [key, value] of Object.entries(params)) {
            if (value !== undefined) search.set(key, String(value));
        }
        if (this.mailto) {
            search.set('mailto', this.mailto);
        }

        const query = search.toString();
        return `${this.baseUrl}${path}${query ? `?${query}` : ''}`;
    }

    private async requestWithRetry(url: string, signal?: AbortSignal): Promise<unknown> {
        const logger = getLogger();
        let failures = 0;
        let throttled = 0;
        let lastError: unknown;

        while (failures < this.maxAttempts) {
            if (signal?.aborted) throw new RequestAbortedError(url);

            this.requestCount++;

            let outcome: AttemptOutcome;
            try {
                outcome = await this.send(url, signal);
            } catch (error) {
                if (signal?.aborted) throw new RequestAbortedError(url);
                lastError = error;
                failures++;
                await this.backoff(failures, url, { error: describe(error) }, signal);
                continue;
            }

            if (outcome.kind === 'throttled') {
                throttled++;
                if (throttled > this.maxThrottleRetries) {
                    throw new RetryExhaustedError(
                        url,
                        failures + throttled,
                        new HttpError(`HTTP ${outcome.status}`, outcome.status, true)
                    );
                }

                logger.warn({ status: outcome.status, waitMs: outcome.waitMs, url }, 'Throttled by API, waiting');
                await this.sleepImpl(outcome.waitMs, signal);
                continue;
            }

            await this.sleepImpl(this.jitter(), signal);
            return outcome.data;
        }

        logger.error({ url, attempts: failures, error: describe(lastError) }, 'Retry budget exhausted');
        throw new RetryExhaustedError(url, failures, lastError);
    }

    /**
     * One attempt. The timeout and the caller's signal stay armed until the
     * body has been read, so a stalled body is aborted like a stalled connect.
     */
    private async send(url: string, signal?: AbortSignal): Promise<AttemptOutcome> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeout);
        const forwardAbort = () => controller.abort();
        signal?.addEventListener('abort', forwardAbort, { once: true });

        try {
            const response = await this.fetchImpl(url, {
                signal: controller.signal,
                headers: {
                    'User-Agent': this.userAgent,
                    Accept: 'application/json',
                },
            });
            return await this.readResponse(response);
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', forwardAbort);
        }
    }

    private async readResponse(response: Response): Promise<AttemptOutcome> {
        if (response.status === 429 || response.status === 403) {
            await response.body?.cancel();
            const waitMs = response.status === 429
                ? parseRetryAfter(response.headers.get('retry-after')) ?? DEFAULT_RETRY_AFTER_MS
                : BLOCKED_WAIT_MS;
            return { kind: 'throttled', status: response.status, waitMs };
        }

        if (!response.ok) {
            // Release the connection before backing off
            await response.body?.cancel();
            throw new HttpError(
                `HTTP ${response.status}: ${response.statusText}`,
                response.status,
                response.status >= 500
            );
        }

        const data: unknown = await response.json();
        return { kind: 'data', data };
    }

    /**
     * Sleep before the next attempt. No sleep once the budget is spent.
     */
    private async backoff(
        failures: number,
        url: string,
        details: Record<string, unknown>,
        signal?: AbortSignal
    ): Promise<void> {
        if (failures >= this.maxAttempts) return;

        const backoffMs = this.calculateBackoff(failures - 1);
        getLogger().warn(
            { ...details, attempt: failures, backoffMs, url },
            'Request failed, backing off'
        );
        await this.sleepImpl(backoffMs, signal);
    }

    private calculateBackoff(attempt: number): number {
        return (Math.pow(this.backoffBase, attempt) + this.backoffFloor) * 1000;
    }

    private jitter(): number {
        return this.jitterMinMs + this.random() * (this.jitterMaxMs - this.jitterMinMs);
    }
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;

    const seconds = Number(header.trim());
    if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;

    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - Date.now());
    }

    return null;
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
