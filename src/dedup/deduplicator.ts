import type { RawWork, Work } from '../types/index.js';
import { normalizeWork } from '../sources/normalize.js';

/**
 * Registry of seen identity keys for one graph-build session.
 *
 * A work is a duplicate when it shares any one of external ID, DOI or
 * normalized title with a work already kept. The first-seen work wins.
 * Key sets only grow; create a new instance per build.
 */
export class Deduplicator {
    private readonly ids = new Set<string>();
    private readonly dois = new Set<string>();
    private readonly titles = new Set<string>();
    private readonly keptWorks: Work[] = [];

    /**
     * Normalize and offer a work.
     * @returns true if the work was new and has been kept
     */
    admit(raw: RawWork): boolean {
        return this.offer(raw) !== null;
    }

    /**
     * Like `admit()`, but returns the normalized work that was kept, or null
     * for a duplicate.
     */
    offer(raw: RawWork): Work | null {
        const work = normalizeWork(raw);
        const id = work.external_id || null;

        if (id && this.ids.has(id)) return null;
        if (work.doi && this.dois.has(work.doi)) return null;
        if (work.title && this.titles.has(work.title)) return null;

        if (id) this.ids.add(id);
        if (work.doi) this.dois.add(work.doi);
        if (work.title) this.titles.add(work.title);

        this.keptWorks.push(work);
        return work;
    }

    /** Kept works in admission order */
    get kept(): readonly Work[] {
        return this.keptWorks;
    }

    get size(): number {
        return this.keptWorks.length;
    }

    hasId(id: string): boolean {
        return this.ids.has(id);
    }

    /** External IDs of every kept work */
    seenIds(): ReadonlySet<string> {
        return this.ids;
    }
}
