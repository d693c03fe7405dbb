// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { partialRatio, ratio } from "./fuzzy.js";
import { copyIndexedEntry, LoreIndex } from "./indexBuilder.js";
import { IndexedEntry, SearchHit, SearchOptions } from "./types.js";

import registerDebug from "debug";
const debug = registerDebug("lore-index:search");

export const NAME_WEIGHT = 2.0;
export const DESCRIPTION_WEIGHT = 1.5;
export const TAG_WEIGHT = 1.2;
export const TEXT_WEIGHT = 1.0;

export interface SearchSettings {
    /** 0..1. Hits whose relevance / 100 falls below this are dropped */
    fuzzyThreshold: number;
    maxResults: number;
    includeRelationships: boolean;
}

/**
 * Mean of the weighted similarity terms: name (partial), description,
 * one term per tag, and the full searchable text (partial).
 * Not capped: a strong name match can push this above 100.
 * @param query lower-cased query
 */
export function scoreEntry(query: string, entry: IndexedEntry): number {
    const scores: number[] = [
        partialRatio(query, entry.name.toLowerCase()) * NAME_WEIGHT,
        ratio(query, entry.description.toLowerCase()) * DESCRIPTION_WEIGHT,
    ];
    for (const tag of entry.tags) {
        scores.push(ratio(query, tag.toLowerCase()) * TAG_WEIGHT);
    }
    scores.push(partialRatio(query, entry.searchableText) * TEXT_WEIGHT);
    return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}

export function searchIndex(
    index: LoreIndex,
    query: string,
    settings: SearchSettings,
    options?: SearchOptions,
): SearchHit[] {
    if (query.trim().length === 0) {
        return [];
    }
    const queryText = query.toLowerCase();
    const minScore = settings.fuzzyThreshold * 100;
    const tagFilter =
        options?.tags && options.tags.length > 0
            ? new Set(options.tags)
            : undefined;

    const scored: { entry: IndexedEntry; score: number }[] = [];
    for (const entry of index.entries.values()) {
        if (options?.category && entry.category !== options.category) {
            continue;
        }
        if (tagFilter && !entry.tags.some((tag) => tagFilter.has(tag))) {
            continue;
        }
        const score = scoreEntry(queryText, entry);
        if (score >= minScore) {
            scored.push({ entry, score });
        }
    }
    // Array.prototype.sort is stable: equal scores keep index order
    scored.sort((x, y) => y.score - x.score);

    const limit =
        options?.limit !== undefined && options.limit > 0
            ? options.limit
            : settings.maxResults;
    const hits = scored.slice(0, limit).map(({ entry, score }) => {
        const hit: SearchHit = {
            entry: copyIndexedEntry(entry),
            score: Math.min(score, 100),
        };
        if (settings.includeRelationships) {
            hit.relationships = index.graph
                .successors(entry.id)
                .map((edge) => ({ ...edge }));
        }
        return hit;
    });
    debug(
        "Query '%s' matched %d entries, returning %d",
        queryText,
        scored.length,
        hits.length,
    );
    return hits;
}
