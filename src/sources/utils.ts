/**
 * Field-level normalization helpers for OpenAlex payloads.
 * All pure: no I/O, no shared state.
 */

/**
 * Read a value as a string, or null if it is anything else.
 */
export function asString(value: unknown): string | null {
    return typeof value === 'string' ? value : null;
}

/**
 * Normalize a title for identity comparison: trim, casefold and collapse
 * whitespace runs to single spaces. Empty or missing titles become null.
 */
export function normalizeTitle(title: unknown): string | null {
    const raw = asString(title);
    if (!raw) return null;

    const normalized = raw.trim().toLowerCase().split(/\s+/).filter(Boolean).join(' ');
    return normalized || null;
}

/**
 * Normalize a DOI for identity comparison.
 * "  HTTPS://doi.org/10.1234/ABC " → "https://doi.org/10.1234/abc"
 */
export function normalizeDoi(doi: unknown): string | null {
    const raw = asString(doi);
    if (!raw) return null;
    return raw.trim().toLowerCase() || null;
}

/**
 * Extract the bare ID from an OpenAlex URL-shaped ID.
 * "https://openalex.org/W2160597895" → "W2160597895"
 *
 * Inputs without a path separator are returned unchanged, so the function is
 * idempotent.
 */
export function extractId(idOrUrl: unknown): string {
    const raw = asString(idOrUrl) ?? '';
    if (!raw.includes('/')) return raw;
    return raw.slice(raw.lastIndexOf('/') + 1);
}

/**
 * Reconstruct abstract text from OpenAlex inverted index format.
 *
 * OpenAlex stores abstracts as inverted indexes: { "word": [position1, position2], ... }
 * Words are placed at every listed position in iteration order; when two
 * words claim the same position the later one wins. Gaps stay empty.
 *
 * @returns Reconstructed abstract text or null
 */
export function reconstructAbstract(invertedIndex: unknown): string | null {
    if (!isPlainObject(invertedIndex)) {
        return null;
    }

    const placements: Array<[string, number[]]> = [];
    let maxPosition = -1;

    for (const [word, positions] of Object.entries(invertedIndex)) {
        if (!Array.isArray(positions)) continue;
        const valid = positions.filter(
            (pos): pos is number => typeof pos === 'number' && Number.isInteger(pos) && pos >= 0
        );
        for (const pos of valid) {
            if (pos > maxPosition) maxPosition = pos;
        }
        placements.push([word, valid]);
    }

    if (maxPosition < 0) return null;

    const words: string[] = new Array<string>(maxPosition + 1).fill('');
    for (const [word, positions] of placements) {
        for (const pos of positions) {
            words[pos] = word;
        }
    }

    return words.join(' ').trim() || null;
}

/**
 * Split a list into fixed-size chunks. The last chunk may be shorter.
 */
export function chunked<T>(items: readonly T[], size: number): T[][] {
    if (!Number.isInteger(size) || size < 1) {
        throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
    }

    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
