// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { ratio } from "./fuzzy.js";
import { copyIndexedEntry, LoreIndex } from "./indexBuilder.js";
import { IndexedEntry, Suggestion } from "./types.js";

export const TAG_OVERLAP_WEIGHT = 2.0;
export const TEXT_SIMILARITY_WEIGHT = 1.0;

export interface SuggestionSettings {
    /** Candidates must score strictly above this */
    minSimilarity: number;
    defaultLimit: number;
}

/**
 * Mean of tag overlap (Jaccard, weighted; skipped when neither entry has
 * tags) and searchable-text similarity scaled to 0..1.
 */
export function entrySimilarity(
    entry: IndexedEntry,
    other: IndexedEntry,
): number {
    const scores: number[] = [];
    const tags = new Set(entry.tags);
    const otherTags = new Set(other.tags);
    if (tags.size > 0 || otherTags.size > 0) {
        let shared = 0;
        for (const tag of tags) {
            if (otherTags.has(tag)) {
                shared++;
            }
        }
        const union = tags.size + otherTags.size - shared;
        scores.push((shared / union) * TAG_OVERLAP_WEIGHT);
    }
    scores.push(
        (ratio(entry.searchableText, other.searchableText) / 100) *
            TEXT_SIMILARITY_WEIGHT,
    );
    return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}

export function suggestSimilar(
    index: LoreIndex,
    entryId: string,
    settings: SuggestionSettings,
    limit?: number,
): Suggestion[] {
    const source = index.entries.get(entryId);
    if (!source) {
        return [];
    }
    const suggestions: Suggestion[] = [];
    for (const other of index.entries.values()) {
        if (other.id === entryId) {
            continue;
        }
        const similarityScore = entrySimilarity(source, other);
        if (similarityScore > settings.minSimilarity) {
            suggestions.push({ entry: other, similarityScore });
        }
    }
    suggestions.sort((x, y) => y.similarityScore - x.similarityScore);
    const count =
        limit !== undefined && limit > 0 ? limit : settings.defaultLimit;
    return suggestions
        .slice(0, count)
        .map(({ entry, similarityScore }) => ({
            entry: copyIndexedEntry(entry),
            similarityScore,
        }));
}
