import type { ExpansionOptions, ExpansionResult, RawWork, Work } from '../types/index.js';
import { Deduplicator } from '../dedup/deduplicator.js';
import type { OpenAlexClient } from '../sources/openalex.js';
import { chunked } from '../sources/utils.js';
import { ConfigError, ExpansionError, RequestAbortedError } from '../utils/errors.js';
import { sleep as defaultSleep, type SleepFn } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

const DEFAULT_CHUNK_SIZE = 100;

/**
 * Grows a citation graph outward from a seed set, one hop at a time.
 *
 * SEEDING → EXPANDING(1..hops) → DONE
 *
 * Each hop fetches every work citing the current frontier (one concurrent
 * `cites:` listing per chunk of frontier IDs), admits the new ones through
 * the session's Deduplicator and derives the next frontier from the IDs
 * admitted this hop. The next frontier is computed only once every chunk of
 * the hop has settled.
 */
export class FrontierExpander {
    private readonly dedup = new Deduplicator();
    private readonly seenIds = new Set<string>();
    private readonly layers: Work[][] = [];
    private started = false;

    constructor(
        private readonly client: OpenAlexClient,
        private readonly options: ExpansionOptions,
        private readonly sleep: SleepFn = defaultSleep
    ) {}

    async run(seedWorks: readonly RawWork[]): Promise<ExpansionResult> {
        const logger = getLogger();
        const { hops } = this.options;
        this.validate();

        let frontier = this.seed(seedWorks);
        logger.info({ seed: this.dedup.size, frontier: frontier.length, hops }, 'Seed admitted');

        for (let hop = 1; hop <= hops; hop++) {
            logger.info({ hop, frontier: frontier.length }, 'Expanding hop');

            const { fetched, layer } = await this.expandHop(hop, frontier);

            const admittedIds = layer.map((w) => w.external_id).filter((id) => id.length > 0);
            frontier = admittedIds.filter((id) => !this.seenIds.has(id));
            for (const id of admittedIds) this.seenIds.add(id);
            this.layers.push(layer);

            logger.info(
                { hop, fetched, admitted: layer.length, total: this.dedup.size },
                'Hop complete'
            );
            this.options.onHop?.({
                hop,
                fetched,
                admitted: layer.length,
                total: this.dedup.size,
                frontier: [...frontier],
            });

            if (frontier.length === 0) {
                logger.info({ hop }, 'No new frontier to expand');
                return this.result(hop, 'empty-frontier');
            }

            if (hop < hops && this.options.delayBetweenHopsMs) {
                await this.pause(hop + 1);
            }
        }

        return this.result(hops, 'max-hops');
    }

    private validate(): void {
        if (this.started) {
            throw new Error('FrontierExpander instances are single-use; create one per build');
        }
        this.started = true;

        const { hops, chunkSize, minCitations, minYear, delayBetweenHopsMs } = this.options;
        if (!Number.isInteger(hops) || hops < 0) {
            throw new ConfigError(`hops must be a non-negative integer, got ${hops}`);
        }
        if (chunkSize !== undefined && (!Number.isInteger(chunkSize) || chunkSize < 1)) {
            throw new ConfigError(`chunkSize must be a positive integer, got ${chunkSize}`);
        }
        if (!Number.isInteger(minCitations) || minCitations < 0) {
            throw new ConfigError(`minCitations must be a non-negative integer, got ${minCitations}`);
        }
        if (minYear !== undefined && (!Number.isInteger(minYear) || minYear < 0)) {
            throw new ConfigError(`minYear must be a non-negative integer, got ${minYear}`);
        }
        if (delayBetweenHopsMs !== undefined && delayBetweenHopsMs < 0) {
            throw new ConfigError(`delayBetweenHopsMs must not be negative, got ${delayBetweenHopsMs}`);
        }
    }

    /**
     * SEEDING: stamp layer 0, admit, and return the initial frontier.
     */
    private seed(seedWorks: readonly RawWork[]): string[] {
        for (const work of seedWorks) {
            this.dedup.admit({ ...work, hop_layer: 0 });
        }
        for (const work of this.dedup.kept) {
            if (work.external_id) this.seenIds.add(work.external_id);
        }
        return [...this.seenIds];
    }

    private async expandHop(hop: number, frontier: readonly string[]): Promise<{ fetched: number; layer: Work[] }> {
        const chunks = chunked(frontier, this.options.chunkSize ?? DEFAULT_CHUNK_SIZE);
        const batches = await this.fetchChunks(hop, chunks);

        let fetched = 0;
        const layer: Work[] = [];
        for (const batch of batches) {
            fetched += batch.length;
            for (const raw of batch) {
                const work = this.dedup.offer({ ...raw, hop_layer: hop });
                if (work) layer.push(work);
            }
        }

        return { fetched, layer };
    }

    /**
     * Fetch all chunks of a hop concurrently. The first failure aborts the
     * rest; the hop fails as a whole once everything has settled.
     *
     * @returns one batch per chunk, in chunk order
     */
    private async fetchChunks(hop: number, chunks: string[][]): Promise<RawWork[][]> {
        const { signal } = this.options;
        const controller = new AbortController();
        const forwardAbort = () => controller.abort();
        signal?.addEventListener('abort', forwardAbort, { once: true });

        try {
            if (signal?.aborted) {
                throw new RequestAbortedError();
            }

            const settled = await Promise.allSettled(
                chunks.map(async (ids) => {
                    try {
                        return await this.client.fetchCitingWorks(ids, {
                            minCitations: this.options.minCitations,
                            minYear: this.options.minYear,
                            select: this.options.select,
                            signal: controller.signal,
                        });
                    } catch (error) {
                        controller.abort();
                        throw error;
                    }
                })
            );

            const batches: RawWork[][] = [];
            const failures: unknown[] = [];
            for (const outcome of settled) {
                if (outcome.status === 'fulfilled') batches.push(outcome.value);
                else failures.push(outcome.reason);
            }

            if (failures.length > 0) {
                // Chunks aborted because a sibling failed are noise; report the root cause.
                throw failures.find((reason) => !(reason instanceof RequestAbortedError)) ?? failures[0];
            }

            return batches;
        } catch (error) {
            getLogger().error({ hop, collected: this.dedup.size, error }, 'Hop failed');
            throw new ExpansionError(hop, [...this.dedup.kept], [...this.layers], error);
        } finally {
            signal?.removeEventListener('abort', forwardAbort);
        }
    }

    private async pause(nextHop: number): Promise<void> {
        try {
            await this.sleep(this.options.delayBetweenHopsMs ?? 0, this.options.signal);
        } catch (error) {
            throw new ExpansionError(nextHop, [...this.dedup.kept], [...this.layers], error);
        }
    }

    private result(hopsCompleted: number, stopReason: ExpansionResult['stopReason']): ExpansionResult {
        return {
            works: [...this.dedup.kept],
            layers: [...this.layers],
            hopsCompleted,
            stopReason,
        };
    }
}

/**
 * Expand `seedWorks` by up to `options.hops` hops of citing works.
 *
 * @throws ExpansionError when a hop fails or the signal fires; partial
 *   results of that hop are discarded
 */
export async function expandFrontier(
    seedWorks: readonly RawWork[],
    client: OpenAlexClient,
    options: ExpansionOptions,
    sleep?: SleepFn
): Promise<ExpansionResult> {
    return new FrontierExpander(client, options, sleep).run(seedWorks);
}
