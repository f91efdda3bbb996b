/**
 * Raw work payload as returned by the OpenAlex `/works` endpoint.
 * Only the fields named in the `select` projection are present, and the
 * service is not trusted to be schema-stable, so every field is read
 * defensively by the normalizer.
 */
export type RawWork = Record<string, unknown>;

/**
 * Work — the normalized graph node.
 * Produced by `normalizeWork()` and owned by the Deduplicator once admitted.
 */
export interface Work {
    /** OpenAlex work ID without the URL prefix (e.g. "W2160597895"). Empty when the payload had none. */
    external_id: string;

    /** Lowercased, trimmed DOI as returned by the API (URL form), or null */
    doi: string | null;

    /** Casefolded, whitespace-collapsed title, or null */
    title: string | null;

    /** Plain-text abstract reconstructed from the inverted index */
    abstract: string | null;

    /** Normalized IDs of the works this one cites, in API order */
    reference_ids: string[];

    /** Hop at which the work was first admitted (0 = seed) */
    hop_layer: number;

    /** Primary topic display name */
    topic: string | null;

    /** Field of the primary topic */
    field: string | null;

    /** Domain of the primary topic */
    domain: string | null;

    /** Pass-through fields (publication_year, cited_by_count, ...) */
    [key: string]: unknown;
}

/**
 * Fields of the raw payload that normalization replaces with canonical ones.
 */
export const RAW_ONLY_FIELDS = [
    'id',
    'abstract_inverted_index',
    'primary_topic',
    'referenced_works',
] as const;
