import type { Work } from '../types/index.js';

/**
 * Directed citation edge: `source` cites `target`.
 */
export interface CitationEdge {
    source: string;
    target: string;
}

/**
 * Adjacency list restricted to the collected graph.
 * Each work maps to the referenced IDs that are themselves in the work set,
 * in reference order, without repeats or self-loops.
 */
export function buildAdjacency(works: readonly Work[]): Map<string, string[]> {
    const known = new Set(works.map((w) => w.external_id).filter((id) => id.length > 0));
    const adjacency = new Map<string, string[]>();

    for (const work of works) {
        if (!work.external_id) continue;

        const targets = new Set<string>();
        for (const ref of work.reference_ids) {
            if (ref !== work.external_id && known.has(ref)) targets.add(ref);
        }
        adjacency.set(work.external_id, [...targets]);
    }

    return adjacency;
}

/**
 * Flatten an adjacency list into an edge list.
 */
export function toEdges(adjacency: ReadonlyMap<string, readonly string[]>): CitationEdge[] {
    const edges: CitationEdge[] = [];
    for (const [source, targets] of adjacency) {
        for (const target of targets) {
            edges.push({ source, target });
        }
    }
    return edges;
}

/**
 * First year of the decade containing `year` (2017 → 2010).
 */
export function decadeStart(year: number): number {
    return Math.floor(year / 10) * 10;
}

/**
 * For each work with a publication year, the in-graph references published
 * in the same decade. Works without a year map to an empty list.
 */
export function inDecadeReferences(works: readonly Work[]): Map<string, string[]> {
    const decades = new Map<string, number>();
    for (const work of works) {
        const year = work['publication_year'];
        if (work.external_id && typeof year === 'number') {
            decades.set(work.external_id, decadeStart(year));
        }
    }

    const result = new Map<string, string[]>();
    for (const [source, targets] of buildAdjacency(works)) {
        const decade = decades.get(source);
        result.set(
            source,
            decade === undefined ? [] : targets.filter((target) => decades.get(target) === decade)
        );
    }
    return result;
}
