import { writeFileSync } from 'node:fs';
import type { ExpansionResult, ExportFormat } from '../types/index.js';
import { buildAdjacency, toEdges, type CitationEdge } from '../graph/adjacency.js';
import { getLogger } from '../utils/logger.js';

export const EXPORT_VERSION = '1.0';

// ─── Main Export Function ────────────────────────────────

/**
 * Write an expansion result for the downstream storage/clustering stages.
 */
export function exportResult(
    result: ExpansionResult,
    outputPath: string,
    format: ExportFormat
): void {
    const edges = toEdges(buildAdjacency(result.works));

    let content: string;
    switch (format) {
        case 'json':
            content = exportJson(result, edges);
            break;
        case 'csv':
            content = exportCsv(edges);
            break;
        default:
            throw new Error(`Unsupported export format: ${String(format)}`);
    }

    writeFileSync(outputPath, content, 'utf-8');
    getLogger().info(
        { format, outputPath, works: result.works.length, edges: edges.length },
        'Graph exported'
    );
}

// ─── Format Implementations ─────────────────────────────

export function exportJson(result: ExpansionResult, edges: readonly CitationEdge[]): string {
    return JSON.stringify({
        hopgraph: {
            version: EXPORT_VERSION,
            exported_at: new Date().toISOString(),
            hops_completed: result.hopsCompleted,
            stop_reason: result.stopReason,
        },
        works: result.works,
        layers: result.layers.map((layer, i) => ({
            hop: i + 1,
            count: layer.length,
            ids: layer.map((w) => w.external_id),
        })),
        edges,
    }, null, 2);
}

export function exportCsv(edges: readonly CitationEdge[]): string {
    const esc = (s: string) => (/[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s);
    const lines = ['source,target'];
    for (const edge of edges) {
        lines.push(`${esc(edge.source)},${esc(edge.target)}`);
    }
    return lines.join('\n') + '\n';
}
