// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { copyIndexedEntry, LoreIndex } from "./indexBuilder.js";
import { RelatedEntry, RelatedOptions } from "./types.js";

/**
 * Breadth-first walk along outgoing edges, one depth level at a time.
 * Depth 1 yields one result per matching edge, so parallel edges to the
 * same target each appear. From depth 2 on, an entry already in the
 * results is not added again; its depth is where it was first reached.
 * Edges to ids that are not indexed are neither results nor expanded.
 */
export function findRelated(
    index: LoreIndex,
    entryId: string,
    options?: RelatedOptions,
): RelatedEntry[] {
    const { graph, entries } = index;
    if (!graph.hasNode(entryId)) {
        return [];
    }
    const maxDepth = options?.maxDepth ?? 1;
    const relationshipType = options?.relationshipType;

    const results: RelatedEntry[] = [];
    const seen = new Set<string>();
    let frontier = [entryId];
    for (let depth = 1; depth <= maxDepth && frontier.length > 0; ++depth) {
        const next: string[] = [];
        for (const sourceId of frontier) {
            for (const edge of graph.successors(sourceId)) {
                if (
                    relationshipType &&
                    edge.relationshipType !== relationshipType
                ) {
                    continue;
                }
                if (depth > 1 && seen.has(edge.targetId)) {
                    continue;
                }
                const entry = entries.get(edge.targetId);
                if (!entry) {
                    continue;
                }
                results.push({
                    entry: copyIndexedEntry(entry),
                    relationship: { ...edge },
                    relationshipType: edge.relationshipType,
                    depth,
                });
                if (!seen.has(edge.targetId)) {
                    seen.add(edge.targetId);
                    next.push(edge.targetId);
                }
            }
        }
        frontier = next;
    }
    return results;
}
