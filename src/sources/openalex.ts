import { z } from 'zod';
import type { RawWork } from '../types/index.js';
import type { HttpClient, RequestOptions } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { anyOf, buildFilter, citingFilter, type CitationFilters } from './filter.js';
import { chunked, extractId } from './utils.js';

const WORKS_PATH = '/works';

/**
 * Cursor value that starts a cursor-paginated listing.
 */
export const START_CURSOR = '*';

export const MAX_PER_PAGE = 200;

/**
 * Shape of one `/works` listing page. Anything that does not match is
 * treated as an empty page.
 */
const worksPageSchema = z.object({
    results: z.array(z.record(z.string(), z.unknown())),
    meta: z
        .object({
            next_cursor: z.string().nullish(),
        })
        .passthrough()
        .nullish(),
});

interface WorksPage {
    results: RawWork[];
    nextCursor: string | null;
}

/**
 * A single logical `/works` query.
 */
export interface WorksQuery {
    search?: string;
    filter?: string;
    /** Field projection, comma-joined when given as a list */
    select?: string | readonly string[];
    /** 1..200, default 200 */
    perPage?: number;
}

export interface CitingWorksOptions extends CitationFilters, RequestOptions {
    select?: string | readonly string[];
}

/**
 * OpenAlex works client.
 *
 * @see https://docs.openalex.org/how-to-use-the-api/get-lists-of-entities/paging
 */
export class OpenAlexClient {
    constructor(private readonly httpClient: HttpClient) {}

    /**
     * Lazily iterate every work matching `query`, following `next_cursor`.
     *
     * Records of a page are yielded before the next page is requested. The
     * sequence ends on a null cursor or a page with no results.
     */
    async *iterateWorks(query: WorksQuery, options: RequestOptions = {}): AsyncGenerator<RawWork, void, undefined> {
        const perPage = query.perPage ?? MAX_PER_PAGE;
        if (!Number.isInteger(perPage) || perPage < 1 || perPage > MAX_PER_PAGE) {
            throw new ConfigError(`perPage must be an integer in 1..${MAX_PER_PAGE}, got ${perPage}`);
        }

        const select = typeof query.select === 'string' ? query.select : query.select?.join(',');
        let cursor: string | null = START_CURSOR;
        let pages = 0;

        while (cursor) {
            const page = await this.fetchPage(
                {
                    search: query.search,
                    filter: query.filter,
                    select,
                    cursor,
                    'per-page': perPage,
                },
                options
            );
            pages++;

            if (page.results.length === 0) break;
            yield* page.results;
            cursor = page.nextCursor;
        }

        getLogger().debug({ pages, filter: query.filter, search: query.search }, 'Listing exhausted');
    }

    /**
     * Collect every work that cites any of `ids`.
     */
    async fetchCitingWorks(ids: readonly string[], options: CitingWorksOptions = {}): Promise<RawWork[]> {
        const filter = citingFilter(ids, options);
        const works: RawWork[] = [];

        for await (const work of this.iterateWorks({ filter, select: options.select }, { signal: options.signal })) {
            works.push(work);
        }

        getLogger().debug({ ids: ids.length, works: works.length }, 'Fetched citing works');
        return works;
    }

    /**
     * Fetch works by OpenAlex ID in batches of `batchSize` (OpenAlex accepts
     * up to 100 pipe-separated IDs per filter).
     */
    async fetchWorksByIds(
        ids: readonly string[],
        options: { batchSize?: number; select?: string | readonly string[] } & RequestOptions = {}
    ): Promise<RawWork[]> {
        const batchSize = options.batchSize ?? 100;
        if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > 100) {
            throw new ConfigError(`batchSize must be an integer in 1..100, got ${batchSize}`);
        }

        const bareIds = ids.map(extractId).filter((id) => id.length > 0);
        const filters = chunked(bareIds, batchSize).map((batch) => buildFilter([anyOf('ids.openalex', batch)]));
        const works: RawWork[] = [];

        for (const filter of filters) {
            for await (const work of this.iterateWorks(
                { filter, select: options.select, perPage: batchSize },
                { signal: options.signal }
            )) {
                works.push(work);
            }
        }

        return works;
    }

    private async fetchPage(
        params: Record<string, string | number | undefined>,
        options: RequestOptions
    ): Promise<WorksPage> {
        const body = await this.httpClient.getJson(WORKS_PATH, params, options);
        const parsed = worksPageSchema.safeParse(body);

        if (!parsed.success) {
            getLogger().warn({ cursor: params['cursor'], issues: parsed.error.issues.length }, 'Malformed works page, treating as empty');
            return { results: [], nextCursor: null };
        }

        return {
            results: parsed.data.results,
            nextCursor: parsed.data.meta?.next_cursor ?? null,
        };
    }
}
