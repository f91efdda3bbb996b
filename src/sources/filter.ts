import { ConfigError } from '../utils/errors.js';
import { extractId } from './utils.js';

/**
 * One `field:value` clause of an OpenAlex filter. Comparison operators are
 * part of the value (`cited_by_count:>20`).
 */
export interface FilterClause {
    field: string;
    value: string;
}

const FIELD_PATTERN = /^[a-z][a-z0-9_.]*$/;

/**
 * `field:>threshold`. Thresholds must be non-negative integers.
 */
export function greaterThan(field: string, threshold: number): FilterClause {
    if (!Number.isInteger(threshold) || threshold < 0) {
        throw new ConfigError(`Filter ${field} needs a non-negative integer threshold, got ${threshold}`);
    }
    return { field, value: `>${threshold}` };
}

/**
 * `field:A|B|C` — matches any of the given values. IDs are reduced to their
 * bare form first.
 */
export function anyOf(field: string, values: readonly string[]): FilterClause {
    const ids = values.map(extractId).filter((id) => id.length > 0);
    if (ids.length === 0) {
        throw new ConfigError(`Filter ${field} needs at least one value`);
    }
    return { field, value: ids.join('|') };
}

/**
 * Compose clauses into the comma-separated filter string.
 * Rejects malformed clauses before anything reaches the network.
 */
export function buildFilter(clauses: readonly FilterClause[]): string {
    if (clauses.length === 0) {
        throw new ConfigError('Filter needs at least one clause');
    }

    return clauses
        .map(({ field, value }) => {
            if (!FIELD_PATTERN.test(field)) {
                throw new ConfigError(`Invalid filter field: "${field}"`);
            }
            if (value.length === 0 || value.includes(',')) {
                throw new ConfigError(`Invalid value for filter ${field}: "${value}"`);
            }
            return `${field}:${value}`;
        })
        .join(',');
}

/**
 * Thresholds shared by the seed query and the per-hop citing-works query.
 */
export interface CitationFilters {
    /** Strictly greater-than; 0 leaves the clause out */
    minCitations?: number;
    /** Strictly greater-than; undefined leaves the clause out */
    minYear?: number;
}

export function thresholdClauses(filters: CitationFilters): FilterClause[] {
    const clauses: FilterClause[] = [];
    if (filters.minCitations) {
        clauses.push(greaterThan('cited_by_count', filters.minCitations));
    }
    if (filters.minYear !== undefined) {
        clauses.push(greaterThan('publication_year', filters.minYear));
    }
    return clauses;
}

/**
 * Filter for works citing any of `ids`, subject to the thresholds.
 * "cites:W1|W2,cited_by_count:>20,publication_year:>1920"
 */
export function citingFilter(ids: readonly string[], filters: CitationFilters = {}): string {
    return buildFilter([anyOf('cites', ids), ...thresholdClauses(filters)]);
}
