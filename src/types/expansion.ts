import type { Work } from './work.js';

/**
 * Why a frontier expansion stopped.
 */
export type StopReason = 'empty-frontier' | 'max-hops';

/**
 * Per-hop progress report passed to `onHop`.
 */
export interface HopReport {
    hop: number;
    /** Raw records returned by the API for this hop, before dedup */
    fetched: number;
    /** Records admitted as new this hop (the layer size) */
    admitted: number;
    /** Total kept records after this hop */
    total: number;
    /** IDs that will be expanded next hop */
    frontier: string[];
}

/**
 * Options for a frontier expansion run.
 */
export interface ExpansionOptions {
    /** Number of hops to expand beyond the seed */
    hops: number;
    /** Only fetch citing works with cited_by_count strictly above this */
    minCitations: number;
    /** Only fetch citing works published strictly after this year */
    minYear?: number;
    /** Field projection, comma-joined when given as a list */
    select?: string | readonly string[];
    /** Frontier IDs per `cites:` request */
    chunkSize?: number;
    /** Pause between hops in milliseconds */
    delayBetweenHopsMs?: number;
    /** Caller-level cancellation */
    signal?: AbortSignal;
    onHop?: (report: HopReport) => void;
}

/**
 * Result of a completed expansion.
 */
export interface ExpansionResult {
    /** Seed plus every admitted work, in admission order */
    works: Work[];
    /** Newly admitted works per hop; `layers[0]` is hop 1 */
    layers: Work[][];
    hopsCompleted: number;
    stopReason: StopReason;
}
