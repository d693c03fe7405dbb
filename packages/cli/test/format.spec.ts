// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import chalk from "chalk";
import { IndexedEntry, RelationshipEdge } from "lore-index";
import {
    formatBuildWarnings,
    formatRelatedEntry,
    formatSearchHit,
    formatStatistics,
    formatSuggestion,
    truncate,
} from "../src/format.js";

chalk.level = 0;

const hero: IndexedEntry = {
    id: "hero",
    name: "Aldric",
    category: "characters",
    description: "Wandering scholar",
    tags: ["mage", "zeloria"],
    relationships: [],
    customFields: {},
    metadata: {},
    searchableText: "aldric wandering scholar mage zeloria",
};

const city: IndexedEntry = {
    id: "city",
    name: "Zeloria",
    category: "locations",
    description: "",
    tags: [],
    relationships: [],
    customFields: {},
    metadata: {},
    searchableText: "zeloria",
};

const locatedIn: RelationshipEdge = {
    sourceId: "hero",
    targetId: "city",
    relationshipType: "located_in",
    strength: 5,
    description: "",
};

describe("format", () => {
    test("truncate", () => {
        expect(truncate("short")).toBe("short");
        const long = truncate("a".repeat(250));
        expect(long).toHaveLength(203);
        expect(long.endsWith("a...")).toBe(true);
        expect(truncate("abcdef", 3)).toBe("abc...");
    });
    test("searchHit", () => {
        expect(formatSearchHit({ entry: hero, score: 55.5 }, 1)).toEqual([
            "1. Aldric [characters] 55.50",
            "   id: hero",
            "   Wandering scholar",
            "   tags: mage, zeloria",
        ]);
    });
    test("searchHit.relationships", () => {
        expect(
            formatSearchHit(
                { entry: city, score: 100, relationships: [locatedIn] },
                2,
            ),
        ).toEqual([
            "2. Zeloria [locations] 100.00",
            "   id: city",
            "   -> located_in city",
        ]);
    });
    test("relatedEntry", () => {
        expect(
            formatRelatedEntry({
                entry: city,
                relationship: locatedIn,
                relationshipType: "located_in",
                depth: 1,
            }),
        ).toBe("[1] hero located_in Zeloria (city)");
        expect(
            formatRelatedEntry({
                entry: city,
                relationship: locatedIn,
                relationshipType: "located_in",
                depth: 3,
            }),
        ).toBe("    [3] hero located_in Zeloria (city)");
    });
    test("suggestion", () => {
        expect(formatSuggestion({ entry: hero, similarityScore: 0.5 })).toBe(
            "Aldric (hero) 0.50",
        );
    });
    test("statistics", () => {
        expect(
            formatStatistics({
                totalEntries: 3,
                perCategoryCounts: { characters: 2, locations: 1 },
                totalRelationships: 1,
                orphanedEntryIds: ["villain"],
                brokenReferences: [
                    {
                        sourceId: "hero",
                        targetId: "ghost",
                        relationshipType: "related_to",
                    },
                ],
            }),
        ).toEqual([
            "Total entries: 3",
            "Total relationships: 1",
            "Entries by category:",
            "  characters    2",
            "  locations     1",
            "Orphaned entries: villain",
            "Broken reference: hero related_to ghost",
        ]);
    });
    test("statistics.empty", () => {
        expect(
            formatStatistics({
                totalEntries: 0,
                perCategoryCounts: {},
                totalRelationships: 0,
                orphanedEntryIds: [],
                brokenReferences: [],
            }),
        ).toEqual(["Total entries: 0", "Total relationships: 0"]);
    });
    test("buildWarnings", () => {
        expect(
            formatBuildWarnings({
                entryCount: 2,
                relationshipCount: 0,
                skippedEntries: [
                    {
                        category: "characters",
                        entryId: "broken",
                        reason: "missing name",
                    },
                ],
                unavailableCategories: [],
                elapsedMs: 1,
            }),
        ).toEqual(["Skipped characters/broken: missing name"]);
    });
});
