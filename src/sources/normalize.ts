import { RAW_ONLY_FIELDS, type RawWork, type Work } from '../types/index.js';
import {
    asString,
    extractId,
    isPlainObject,
    normalizeDoi,
    normalizeTitle,
    reconstructAbstract,
} from './utils.js';

interface TopicFields {
    topic: string | null;
    field: string | null;
    domain: string | null;
}

/**
 * Pull display names out of the nested `primary_topic` object.
 * All three are null when there is no primary topic.
 */
function extractTopic(primaryTopic: unknown): TopicFields {
    if (!isPlainObject(primaryTopic)) {
        return { topic: null, field: null, domain: null };
    }

    const displayName = (value: unknown): string | null =>
        isPlainObject(value) ? asString(value['display_name']) : null;

    return {
        topic: asString(primaryTopic['display_name']),
        field: displayName(primaryTopic['field']),
        domain: displayName(primaryTopic['domain']),
    };
}

function normalizeReferences(raw: unknown): string[] {
    if (!Array.isArray(raw)) return [];
    return raw.map(extractId).filter((id) => id.length > 0);
}

/**
 * Normalize a raw OpenAlex work into a `Work`.
 *
 * Idempotent: a normalized work fed back in comes out unchanged, because each
 * canonical field falls back to its already-normalized counterpart when the
 * raw representation is gone.
 */
export function normalizeWork(raw: RawWork): Work {
    const rest: Record<string, unknown> = { ...raw };
    for (const key of RAW_ONLY_FIELDS) {
        delete rest[key];
    }

    const abstract = 'abstract_inverted_index' in raw
        ? reconstructAbstract(raw['abstract_inverted_index'])
        : asString(raw['abstract']);

    const topicFields = 'primary_topic' in raw
        ? extractTopic(raw['primary_topic'])
        : {
            topic: asString(raw['topic']),
            field: asString(raw['field']),
            domain: asString(raw['domain']),
        };

    const hopLayer = raw['hop_layer'];

    return {
        ...rest,
        external_id: extractId(raw['id'] ?? raw['external_id']),
        doi: normalizeDoi(raw['doi']),
        title: normalizeTitle(raw['title']),
        abstract,
        reference_ids: normalizeReferences(raw['referenced_works'] ?? raw['reference_ids']),
        hop_layer: typeof hopLayer === 'number' ? hopLayer : 0,
        ...topicFields,
    };
}
