import { describe, it, expect, vi } from 'vitest';
import { HttpClient } from '../utils/http-client.js';
import { OpenAlexClient } from '../sources/openalex.js';
import { buildSeed } from '../builder/seed.js';
import { expandFrontier, FrontierExpander } from '../builder/frontier-expander.js';
import { ConfigError, ExpansionError, RequestAbortedError, RetryExhaustedError } from '../utils/errors.js';
import type { HopReport } from '../types/index.js';
import { FakeOpenAlex, jsonResponse, sampleWorks, type FakeWork } from './helpers/fake-openalex.js';

function setup(latencyMs = 0) {
    const works = sampleWorks();
    const fake = new FakeOpenAlex(works, latencyMs);
    const http = new HttpClient({
        baseUrl: 'https://api.test',
        fetch: fake.fetch,
        sleep: async () => {},
        maxAttempts: 2,
        concurrency: 4,
    });
    const byId = (n: number): FakeWork => {
        const work = works.find((w) => w.id === `https://openalex.org/W${n}`);
        if (!work) throw new Error(`No sample work W${n}`);
        return work;
    };
    return { fake, http, client: new OpenAlexClient(http), seed: [byId(1), byId(2)], byId };
}

const ids = (works: ReadonlyArray<{ external_id: string }>) => works.map((w) => w.external_id);

const baseOptions = { minCitations: 10, minYear: 1990, chunkSize: 1 };

describe('buildSeed', () => {
    it('should collect and deduplicate the search results', async () => {
        const { fake, client } = setup();

        const seed = await buildSeed(client, { search: 'vector', minCitations: 10, minYear: 1990 });

        // W9 repeats W1's title once normalized
        expect(ids(seed)).toEqual(['W1', 'W2']);
        expect(seed.map((w) => w.title)).toEqual(['vector space models', 'vector semantics']);
        expect(seed.every((w) => w.hop_layer === 0)).toBe(true);
        expect(fake.filters).toEqual(['cited_by_count:>10,publication_year:>1990']);
    });
});

describe('FrontierExpander', () => {
    it('should expand hop by hop and stamp layers', async () => {
        const { client, seed } = setup();

        const result = await expandFrontier(seed, client, { ...baseOptions, hops: 3 });

        expect(result.layers.map(ids)).toEqual([['W3', 'W4'], ['W7'], ['W8']]);
        expect(ids(result.works)).toEqual(['W1', 'W2', 'W3', 'W4', 'W7', 'W8']);
        expect(result.works.map((w) => w.hop_layer)).toEqual([0, 0, 1, 1, 2, 3]);
        expect(result.hopsCompleted).toBe(3);
        expect(result.stopReason).toBe('max-hops');
    });

    it('should keep layer accounting exact', async () => {
        const { client, seed } = setup();

        const result = await expandFrontier(seed, client, { ...baseOptions, hops: 3 });

        const layered = result.layers.reduce((sum, layer) => sum + layer.length, 0);
        expect(result.works).toHaveLength(seed.length + layered);
    });

    it('should issue one request per frontier chunk', async () => {
        const { fake, client, seed } = setup();

        await expandFrontier(seed, client, { ...baseOptions, hops: 2 });

        expect([...fake.filters].sort()).toEqual([
            'cites:W1,cited_by_count:>10,publication_year:>1990',
            'cites:W2,cited_by_count:>10,publication_year:>1990',
            'cites:W3,cited_by_count:>10,publication_year:>1990',
            'cites:W4,cited_by_count:>10,publication_year:>1990',
        ]);
    });

    it('should group the frontier into chunks of chunkSize IDs', async () => {
        const { fake, client, seed } = setup();

        await expandFrontier(seed, client, { minCitations: 10, minYear: 1990, chunkSize: 100, hops: 1 });

        expect(fake.filters).toEqual(['cites:W1|W2,cited_by_count:>10,publication_year:>1990']);
    });

    it('should never put a seen ID back on the frontier', async () => {
        const { client, seed } = setup();
        const reports: HopReport[] = [];

        await expandFrontier(seed, client, { ...baseOptions, hops: 5, onHop: (r) => reports.push(r) });

        const seen = new Set(['W1', 'W2']);
        for (const report of reports) {
            for (const id of report.frontier) {
                expect(seen.has(id)).toBe(false);
            }
            for (const id of report.frontier) seen.add(id);
        }
        expect(reports.map((r) => r.frontier)).toEqual([['W3', 'W4'], ['W7'], ['W8'], []]);
    });

    it('should report fetched and admitted counts per hop', async () => {
        const { client, seed } = setup();
        const reports: HopReport[] = [];

        await expandFrontier(seed, client, { ...baseOptions, hops: 2, onHop: (r) => reports.push(r) });

        // Hop 1: W3, W4, W5 cite W1 and W4 cites W2; W5 repeats W3's DOI
        // Hop 2: W7 cites W3 and W2 cites W4; W2 is already kept
        expect(reports.map(({ hop, fetched, admitted, total }) => ({ hop, fetched, admitted, total }))).toEqual([
            { hop: 1, fetched: 4, admitted: 2, total: 4 },
            { hop: 2, fetched: 2, admitted: 1, total: 5 },
        ]);
    });

    it('should stop when the frontier runs dry', async () => {
        const { client, seed } = setup();

        const result = await expandFrontier(seed, client, { ...baseOptions, hops: 10 });

        expect(result.stopReason).toBe('empty-frontier');
        expect(result.hopsCompleted).toBe(4);
        expect(result.layers.map((l) => l.length)).toEqual([2, 1, 1, 0]);
    });

    it('should stop after hop 1 when nothing new is admitted', async () => {
        const { fake, client, byId } = setup();

        const result = await expandFrontier([byId(8)], client, { ...baseOptions, hops: 3 });

        expect(result.hopsCompleted).toBe(1);
        expect(result.stopReason).toBe('empty-frontier');
        expect(result.layers).toEqual([[]]);
        expect(ids(result.works)).toEqual(['W8']);
        expect(fake.requests).toHaveLength(1);
    });

    it('should deduplicate the seed itself', async () => {
        const { client, byId } = setup();

        const result = await expandFrontier([byId(1), byId(9), byId(1)], client, { ...baseOptions, hops: 0 });

        expect(ids(result.works)).toEqual(['W1']);
        expect(result.layers).toEqual([]);
        expect(result.stopReason).toBe('max-hops');
    });

    it('should pause between hops but not after the last one', async () => {
        const { client, seed } = setup();
        const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});

        await expandFrontier(seed, client, { ...baseOptions, hops: 3, delayBetweenHopsMs: 250 }, sleep);

        expect(sleep.mock.calls.map((call) => call[0])).toEqual([250, 250]);
    });

    it('should be deterministic regardless of chunk completion order', async () => {
        const { fake, client, seed } = setup();
        // Make the W1 chunk finish last
        const original = fake.fetch;
        const delayed = new OpenAlexClient(new HttpClient({
            baseUrl: 'https://api.test',
            sleep: async () => {},
            fetch: async (url, init) => {
                if (url.includes('cites%3AW1')) await new Promise((r) => setTimeout(r, 20));
                return original(url, init);
            },
        }));

        const fast = await expandFrontier(seed, client, { ...baseOptions, hops: 3 });
        const slow = await expandFrontier(seed, delayed, { ...baseOptions, hops: 3 });

        expect(slow.layers.map(ids)).toEqual(fast.layers.map(ids));
    });

    describe('failures', () => {
        it('should abort the expansion when a chunk exhausts its retries', async () => {
            const { fake, client, seed } = setup();
            fake.intercept = (url) =>
                url.searchParams.get('filter')?.startsWith('cites:W3') ? jsonResponse({}, 500) : undefined;

            const error = await expandFrontier(seed, client, { ...baseOptions, hops: 3 }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ExpansionError);
            if (!(error instanceof ExpansionError)) return;
            expect(error.hop).toBe(2);
            expect(error.collected).toBe(4);
            expect(error.layers.map(ids)).toEqual([['W3', 'W4']]);
            expect(error.cause).toBeInstanceOf(RetryExhaustedError);
        });

        it('should fail the first hop without partial results', async () => {
            const { fake, client, seed } = setup();
            fake.intercept = (url) =>
                url.searchParams.get('filter')?.startsWith('cites:W2') ? jsonResponse({}, 503) : undefined;

            const error = await expandFrontier(seed, client, { ...baseOptions, hops: 2 }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ExpansionError);
            if (!(error instanceof ExpansionError)) return;
            expect(error.hop).toBe(1);
            expect(ids(error.works)).toEqual(['W1', 'W2']);
            expect(error.layers).toEqual([]);
        });

        it('should surface caller cancellation as one expansion error', async () => {
            const { fake, client, seed } = setup(200);
            const controller = new AbortController();
            setTimeout(() => controller.abort(), 20);

            const error = await expandFrontier(seed, client, { ...baseOptions, hops: 2, signal: controller.signal })
                .catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ExpansionError);
            if (!(error instanceof ExpansionError)) return;
            expect(error.hop).toBe(1);
            expect(error.cause).toBeInstanceOf(RequestAbortedError);
            expect(fake.requests).toHaveLength(2);
        });

        it('should reject invalid options before any request', async () => {
            const { fake, client, seed } = setup();

            await expect(expandFrontier(seed, client, { ...baseOptions, hops: -1 })).rejects.toBeInstanceOf(ConfigError);
            await expect(expandFrontier(seed, client, { ...baseOptions, hops: 1, chunkSize: 0 })).rejects.toBeInstanceOf(ConfigError);
            await expect(expandFrontier(seed, client, { ...baseOptions, hops: 1, minCitations: -5 })).rejects.toBeInstanceOf(ConfigError);
            await expect(expandFrontier(seed, client, { ...baseOptions, hops: 1, minYear: -1 })).rejects.toBeInstanceOf(ConfigError);
            await expect(expandFrontier(seed, client, { ...baseOptions, hops: 1, minYear: 2000.5 })).rejects.toBeInstanceOf(ConfigError);
            expect(fake.requests).toHaveLength(0);
        });

        it('should refuse to run an expander twice', async () => {
            const { client, seed } = setup();
            const expander = new FrontierExpander(client, { ...baseOptions, hops: 0 });

            await expander.run(seed);
            await expect(expander.run(seed)).rejects.toThrow('single-use');
        });
    });
});
