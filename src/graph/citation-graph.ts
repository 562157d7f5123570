import { MultiDirectedGraph } from 'graphology';
import type { PublicationRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export type CitationEdgeKind = 'reference' | 'citation';

/**
 * A directed "cites" relation, `source` citing `target`, and the list it came from.
 */
export interface CitationEdge {
    source: string;
    target: string;
    kind: CitationEdgeKind;
}

export interface CitationNodeAttributes {
    title: string | null;
    year: number | null;
    /** True when a full record was available for the node */
    resolved: boolean;
    seed: boolean;
}

export interface CitationEdgeAttributes {
    kind: CitationEdgeKind;
}

export type CitationGraph = MultiDirectedGraph<CitationNodeAttributes, CitationEdgeAttributes>;

/**
 * Edges implied by one record: `record → ref` for each reference and
 * `citer → record` for each citation.
 */
export function citationEdges(record: Pick<PublicationRecord, 'canonical_id' | 'references' | 'citations'>): CitationEdge[] {
    return [
        ...record.references.map((ref): CitationEdge => ({ source: record.canonical_id, target: ref, kind: 'reference' })),
        ...record.citations.map((citer): CitationEdge => ({ source: citer, target: record.canonical_id, kind: 'citation' })),
    ];
}

/**
 * Build a citation graph from cached records.
 * The same pair may be linked twice (once from each side's list), so the
 * graph is a multigraph; the edge `kind` tells the two apart.
 *
 * @param canonicalOf - maps a link id to the canonical id it is cached under, so
 *   records keyed by different id kinds land on one node
 */
export function buildCitationGraph(
    records: Iterable<PublicationRecord>,
    seedIds: Iterable<string> = [],
    canonicalOf: (id: string) => string = (id) => id
): CitationGraph {
    const graph: CitationGraph = new MultiDirectedGraph<CitationNodeAttributes, CitationEdgeAttributes>({
        allowSelfLoops: false,
    });
    const seeds = new Set([...seedIds].map(canonicalOf));
    const list = [...records];

    for (const record of list) {
        const id = canonicalOf(record.canonical_id);
        graph.mergeNode(id, {
            title: record.title || null,
            year: record.year,
            resolved: true,
            seed: seeds.has(id),
        });
    }

    for (const record of list) {
        for (const edge of citationEdges(record)) {
            const source = canonicalOf(edge.source);
            const target = canonicalOf(edge.target);
            if (source === target) continue;

            for (const node of [source, target]) {
                if (!graph.hasNode(node)) {
                    graph.addNode(node, {
                        title: null,
                        year: record.linked_years[edge.kind === 'reference' ? edge.target : edge.source] ?? null,
                        resolved: false,
                        seed: seeds.has(node),
                    });
                }
            }
            graph.addEdge(source, target, { kind: edge.kind });
        }
    }

    logger.debug({ nodes: graph.order, edges: graph.size }, 'Citation graph built');
    return graph;
}

export interface CitationGraphStats {
    nodes: number;
    edges: number;
    resolvedNodes: number;
    seedNodes: number;
}

export function graphStats(graph: CitationGraph): CitationGraphStats {
    let resolvedNodes = 0;
    let seedNodes = 0;
    graph.forEachNode((_node, attributes) => {
        if (attributes.resolved) resolvedNodes++;
        if (attributes.seed) seedNodes++;
    });
    return { nodes: graph.order, edges: graph.size, resolvedNodes, seedNodes };
}
