// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/**
 * Index builder: one pass over the store produces both the Index
 * (id → IndexedEntry) and the Relationship Graph.
 *
 * Pipeline, per category:
 * 1. Read raw entries from the store (unavailable → zero entries, reported)
 * 2. Parse each entry (malformed or duplicate id → skipped, reported)
 * 3. Derive searchable text, add the indexed entry and its graph node
 * 4. Add one edge per relationship declaration
 */

import { parseEntry } from "./entry.js";
import { IEntryStore } from "./entryStore.js";
import { RelationshipGraph } from "./relationshipGraph.js";
import { buildSearchableText } from "./searchableText.js";
import {
    BuildReport,
    CustomFieldValue,
    IndexedEntry,
    loreCategories,
    LoreCategory,
    SkippedEntry,
    UnavailableCategory,
} from "./types.js";

import registerDebug from "debug";
const debug = registerDebug("lore-index:build");

/**
 * A complete, immutable-by-convention snapshot of Index + Graph.
 * Never edited after build: a refresh replaces the whole snapshot.
 */
export interface LoreIndex {
    /** Iteration order is build order: category order, then store order */
    entries: ReadonlyMap<string, IndexedEntry>;
    graph: RelationshipGraph;
}

export interface BuildResult {
    index: LoreIndex;
    report: BuildReport;
}

export function buildLoreIndex(
    store: IEntryStore,
    categories: readonly LoreCategory[] = loreCategories,
): BuildResult {
    const start = Date.now();
    const entries = new Map<string, IndexedEntry>();
    const graph = new RelationshipGraph();
    const skippedEntries: SkippedEntry[] = [];
    const unavailableCategories: UnavailableCategory[] = [];

    for (const category of categories) {
        const categoryResult = store.readCategory(category);
        if (!categoryResult.success) {
            debug(
                "Category %s unavailable: %s",
                category,
                categoryResult.message,
            );
            unavailableCategories.push({
                category,
                reason: categoryResult.message,
            });
            continue;
        }

        for (const [entryId, raw] of Object.entries(categoryResult.data)) {
            if (entries.has(entryId)) {
                skip(category, entryId, "duplicate id");
                continue;
            }
            const parsed = parseEntry(raw, entryId, category);
            if (!parsed.success) {
                skip(category, entryId, parsed.message);
                continue;
            }
            const entry = parsed.data;
            entries.set(entry.id, {
                ...entry,
                searchableText: buildSearchableText(entry),
            });
            graph.addNode({
                id: entry.id,
                name: entry.name,
                category: entry.category,
            });
            for (const rel of entry.relationships) {
                graph.addEdge({
                    sourceId: entry.id,
                    targetId: rel.targetId,
                    relationshipType: rel.relationshipType,
                    strength: rel.strength,
                    description: rel.description ?? "",
                });
            }
        }
    }

    const report: BuildReport = {
        entryCount: entries.size,
        relationshipCount: graph.edgeCount,
        skippedEntries,
        unavailableCategories,
        elapsedMs: Date.now() - start,
    };
    debug(
        "Index build complete in %dms: %d entries, %d relationships, %d skipped",
        report.elapsedMs,
        report.entryCount,
        report.relationshipCount,
        skippedEntries.length,
    );
    return { index: { entries, graph }, report };

    function skip(category: LoreCategory, entryId: string, reason: string) {
        debug("Skipping %s/%s: %s", category, entryId, reason);
        skippedEntries.push({ category, entryId, reason });
    }
}

/**
 * Copy handed to callers; the snapshot's own entries are never exposed
 */
export function copyIndexedEntry(entry: IndexedEntry): IndexedEntry {
    const customFields: Record<string, CustomFieldValue> = {};
    for (const [name, field] of Object.entries(entry.customFields)) {
        customFields[name] = copyCustomField(field);
    }
    return {
        ...entry,
        tags: [...entry.tags],
        relationships: entry.relationships.map((rel) => ({ ...rel })),
        customFields,
        metadata: { ...entry.metadata },
    };
}

function copyCustomField(field: CustomFieldValue): CustomFieldValue {
    return field.type === "list"
        ? { type: "list", value: [...field.value] }
        : { ...field };
}
