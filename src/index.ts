/**
 * hopgraph — multi-hop citation graph acquisition from OpenAlex.
 */
export * from './types/index.js';
export { normalizeWork } from './sources/normalize.js';
export {
    normalizeTitle,
    normalizeDoi,
    extractId,
    reconstructAbstract,
    chunked,
} from './sources/utils.js';
export { buildFilter, greaterThan, anyOf, citingFilter, type FilterClause, type CitationFilters } from './sources/filter.js';
export { OpenAlexClient, START_CURSOR, type WorksQuery, type CitingWorksOptions } from './sources/openalex.js';
export { Deduplicator } from './dedup/deduplicator.js';
export { buildSeed, type SeedOptions } from './builder/seed.js';
export { FrontierExpander, expandFrontier } from './builder/frontier-expander.js';
export { buildAdjacency, toEdges, inDecadeReferences, decadeStart, type CitationEdge } from './graph/adjacency.js';
export { exportResult } from './exporters/export.js';
export {
    HttpClient,
    createHttpClient,
    sleep,
    parseRetryAfter,
    type HttpClientOptions,
    type FetchLike,
    type QueryParams,
    type RequestOptions,
    type SleepFn,
} from './utils/http-client.js';
export {
    HttpError,
    RetryExhaustedError,
    RequestAbortedError,
    ConfigError,
    ExpansionError,
} from './utils/errors.js';
export { resolveConfig, validateConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
