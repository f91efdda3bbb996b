import { describe, it, expect, vi } from 'vitest';
import { HttpClient, type FetchLike } from '../utils/http-client.js';
import { OpenAlexClient } from '../sources/openalex.js';
import { ConfigError } from '../utils/errors.js';
import { buildFilter, greaterThan, anyOf, citingFilter } from '../sources/filter.js';
import { FakeOpenAlex, jsonResponse, sampleWorks, type FakeWork } from './helpers/fake-openalex.js';

function makeClient(fetchImpl: FetchLike) {
    return new OpenAlexClient(new HttpClient({
        baseUrl: 'https://api.test',
        fetch: fetchImpl,
        sleep: async () => {},
    }));
}

function numbered(count: number): FakeWork[] {
    return Array.from({ length: count }, (_, i) => ({
        id: `https://openalex.org/W${i + 1}`,
        title: `Paper ${i + 1}`,
        cited_by_count: 10,
    }));
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of iterable) items.push(item);
    return items;
}

describe('Filter composition', () => {
    it('should compose clauses with commas', () => {
        expect(buildFilter([greaterThan('cited_by_count', 20), greaterThan('publication_year', 1920)]))
            .toBe('cited_by_count:>20,publication_year:>1920');
    });

    it('should build a cites filter from URL-shaped IDs', () => {
        expect(citingFilter(['https://openalex.org/W1', 'W2'], { minCitations: 20, minYear: 1920 }))
            .toBe('cites:W1|W2,cited_by_count:>20,publication_year:>1920');
    });

    it('should leave out a zero citation threshold', () => {
        expect(citingFilter(['W1'], { minCitations: 0 })).toBe('cites:W1');
    });

    it('should reject malformed clauses', () => {
        expect(() => buildFilter([])).toThrow(ConfigError);
        expect(() => buildFilter([{ field: 'Bad Field', value: '1' }])).toThrow(ConfigError);
        expect(() => buildFilter([{ field: 'title.search', value: 'a,b' }])).toThrow(ConfigError);
        expect(() => buildFilter([{ field: 'doi', value: '' }])).toThrow(ConfigError);
    });

    it('should reject invalid thresholds and empty ID lists', () => {
        expect(() => greaterThan('cited_by_count', -1)).toThrow(ConfigError);
        expect(() => greaterThan('publication_year', 19.5)).toThrow(ConfigError);
        expect(() => anyOf('cites', [])).toThrow(ConfigError);
        expect(() => anyOf('cites', [''])).toThrow(ConfigError);
    });
});

describe('OpenAlexClient', () => {
    describe('iterateWorks', () => {
        it('should follow cursors until the last page', async () => {
            const fake = new FakeOpenAlex(numbered(5));
            const client = makeClient(fake.fetch);

            const works = await collect(client.iterateWorks({ perPage: 2 }));

            expect(works.map((w) => w['id'])).toEqual([1, 2, 3, 4, 5].map((n) => `https://openalex.org/W${n}`));
            expect(fake.requests.map((u) => u.searchParams.get('cursor'))).toEqual(['*', 'offset:2', 'offset:4']);
            expect(fake.requests.every((u) => u.searchParams.get('per-page') === '2')).toBe(true);
        });

        it('should be lazy', async () => {
            const fake = new FakeOpenAlex(numbered(5));
            const client = makeClient(fake.fetch);

            for await (const work of client.iterateWorks({ perPage: 2 })) {
                expect(work['id']).toBe('https://openalex.org/W1');
                break;
            }

            expect(fake.requests).toHaveLength(1);
        });

        it('should pass search, filter and select through', async () => {
            const fake = new FakeOpenAlex(sampleWorks());
            const client = makeClient(fake.fetch);

            const works = await collect(client.iterateWorks({
                search: 'vector',
                filter: 'cited_by_count:>55',
                select: ['id', 'title'],
            }));

            expect(works).toEqual([
                { id: 'https://openalex.org/W1', title: 'Vector Space Models' },
                { id: 'https://openalex.org/W9', title: 'VECTOR space   models' },
            ]);
            const params = fake.requests[0]?.searchParams;
            expect(params?.get('search')).toBe('vector');
            expect(params?.get('select')).toBe('id,title');
        });

        it('should stop on a page with no results even if a cursor is returned', async () => {
            const fetchImpl = vi.fn(async (_url: string) => jsonResponse({ results: [], meta: { next_cursor: 'more' } }));
            const client = makeClient(fetchImpl);

            expect(await collect(client.iterateWorks({}))).toEqual([]);
            expect(fetchImpl).toHaveBeenCalledTimes(1);
        });

        it('should treat a malformed body as an empty page', async () => {
            const fetchImpl = vi.fn(async (_url: string) => jsonResponse({ message: 'unexpected' }));
            const client = makeClient(fetchImpl);

            expect(await collect(client.iterateWorks({}))).toEqual([]);
            expect(fetchImpl).toHaveBeenCalledTimes(1);
        });

        it('should reject an invalid page size before any request', async () => {
            const fetchImpl = vi.fn(async (_url: string) => jsonResponse({ results: [] }));
            const client = makeClient(fetchImpl);

            await expect(collect(client.iterateWorks({ perPage: 0 }))).rejects.toBeInstanceOf(ConfigError);
            await expect(collect(client.iterateWorks({ perPage: 201 }))).rejects.toBeInstanceOf(ConfigError);
            expect(fetchImpl).not.toHaveBeenCalled();
        });
    });

    describe('fetchCitingWorks', () => {
        it('should collect every work citing the given IDs', async () => {
            const fake = new FakeOpenAlex(sampleWorks());
            const client = makeClient(fake.fetch);

            const works = await client.fetchCitingWorks(['https://openalex.org/W1'], { minCitations: 10, minYear: 1990 });

            expect(works.map((w) => w['id'])).toEqual([3, 4, 5].map((n) => `https://openalex.org/W${n}`));
            expect(fake.filters).toEqual(['cites:W1,cited_by_count:>10,publication_year:>1990']);
        });

        it('should reject an empty ID list without a request', async () => {
            const fake = new FakeOpenAlex(sampleWorks());
            const client = makeClient(fake.fetch);

            await expect(client.fetchCitingWorks([])).rejects.toBeInstanceOf(ConfigError);
            expect(fake.requests).toHaveLength(0);
        });
    });

    describe('fetchWorksByIds', () => {
        it('should fetch in batches', async () => {
            const fake = new FakeOpenAlex(sampleWorks());
            const client = makeClient(fake.fetch);

            const works = await client.fetchWorksByIds(
                ['https://openalex.org/W1', 'W2', 'https://openalex.org/W3'],
                { batchSize: 2 }
            );

            expect(works.map((w) => w['id'])).toEqual([1, 2, 3].map((n) => `https://openalex.org/W${n}`));
            expect(fake.filters).toEqual(['ids.openalex:W1|W2', 'ids.openalex:W3']);
        });

        it('should return nothing for no IDs', async () => {
            const fake = new FakeOpenAlex(sampleWorks());
            expect(await makeClient(fake.fetch).fetchWorksByIds([])).toEqual([]);
            expect(fake.requests).toHaveLength(0);
        });
    });
});
