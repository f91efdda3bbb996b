/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Result export formats.
 */
export type ExportFormat = 'json' | 'csv';

/**
 * Full hopgraph configuration merged from CLI flags, env vars, and config file.
 */
export interface HopGraphConfig {
    // Seed query
    search?: string;
    seedMinCitations: number;
    seedMinYear: number;

    // Expansion
    hops: number;
    minCitations: number;
    minYear: number;
    select: string[];
    chunkSize: number;
    perPage: number;
    delayBetweenHopsMs: number;

    // HTTP client
    mailto?: string;
    concurrency: number;
    maxAttempts: number;
    backoffBase: number;
    backoffFloor: number;
    requestTimeoutMs: number;

    // Output
    out: string;
    format: ExportFormat;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: HopGraphConfig = {
    seedMinCitations: 20,
    seedMinYear: 1920,
    hops: 2,
    minCitations: 20,
    minYear: 1920,
    select: [
        'id',
        'doi',
        'title',
        'publication_year',
        'cited_by_count',
        'abstract_inverted_index',
        'referenced_works',
        'primary_topic',
    ],
    chunkSize: 100,
    perPage: 200,
    delayBetweenHopsMs: 200,
    concurrency: 30,
    maxAttempts: 5,
    backoffBase: 1.5,
    backoffFloor: 0.5,
    requestTimeoutMs: 30000,
    out: './hopgraph.json',
    format: 'json',
    logLevel: 'info',
    jsonLogs: false,
};
