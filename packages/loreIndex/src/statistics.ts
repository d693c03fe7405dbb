// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { LoreIndex } from "./indexBuilder.js";
import { BrokenReference, LoreStatistics } from "./types.js";

export function computeStatistics(index: LoreIndex): LoreStatistics {
    const { entries, graph } = index;
    const stats: LoreStatistics = {
        totalEntries: entries.size,
        perCategoryCounts: {},
        totalRelationships: graph.edgeCount,
        orphanedEntryIds: [],
        brokenReferences: [],
    };
    for (const entry of entries.values()) {
        stats.perCategoryCounts[entry.category] =
            (stats.perCategoryCounts[entry.category] ?? 0) + 1;
        if (graph.inDegree(entry.id) === 0 && graph.outDegree(entry.id) === 0) {
            stats.orphanedEntryIds.push(entry.id);
        }
    }
    for (const edge of graph.edges()) {
        if (!entries.has(edge.targetId)) {
            const broken: BrokenReference = {
                sourceId: edge.sourceId,
                targetId: edge.targetId,
                relationshipType: edge.relationshipType,
            };
            stats.brokenReferences.push(broken);
        }
    }
    return stats;
}
