import type { Work } from '../types/index.js';
import { Deduplicator } from '../dedup/deduplicator.js';
import type { OpenAlexClient } from '../sources/openalex.js';
import { buildFilter, thresholdClauses } from '../sources/filter.js';
import { getLogger } from '../utils/logger.js';
import type { RequestOptions } from '../utils/http-client.js';

const PROGRESS_EVERY = 200;

export interface SeedOptions extends RequestOptions {
    search: string;
    /** Only works with cited_by_count strictly above this */
    minCitations: number;
    /** Only works published strictly after this year */
    minYear: number;
    select?: string | readonly string[];
    perPage?: number;
}

/**
 * Build the hop-0 seed set: every work matching the search and thresholds,
 * deduplicated in the order the API returns them.
 */
export async function buildSeed(client: OpenAlexClient, options: SeedOptions): Promise<Work[]> {
    const logger = getLogger();
    const filter = buildFilter(thresholdClauses({
        minCitations: options.minCitations,
        minYear: options.minYear,
    }));

    const dedup = new Deduplicator();
    let seen = 0;

    logger.info({ search: options.search, filter }, 'Building seed');

    for await (const work of client.iterateWorks(
        { search: options.search, filter, select: options.select, perPage: options.perPage },
        { signal: options.signal }
    )) {
        dedup.admit(work);
        seen++;
        if (seen % PROGRESS_EVERY === 0) {
            logger.info({ seen, kept: dedup.size }, 'Seed progress');
        }
    }

    logger.info({ seen, kept: dedup.size }, 'Seed built');
    return [...dedup.kept];
}
