// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import * as path from "path";
import { loadLoreConfig, parseLoreConfig } from "../src/config.js";
import { createLoreQueryEngine } from "../src/queryEngine.js";
import { loreCategories } from "../src/types.js";

describe("config", () => {
    const dataPath = path.join(__dirname, "data");
    const baseDir = path.resolve("/lore");

    test("parse.defaults", () => {
        const result = parseLoreConfig({ database_path: "db" }, baseDir);
        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.data).toEqual({
                databasePath: path.resolve(baseDir, "db"),
                categories: [...loreCategories],
                search: {
                    fuzzyThreshold: 0.4,
                    maxResults: 20,
                    includeRelationships: false,
                },
                suggestions: { minSimilarity: 0.3, defaultLimit: 5 },
            });
        }
    });
    test("parse.envOverrides", () => {
        const result = parseLoreConfig(
            {
                database_path: "db",
                search_settings: { fuzzy_threshold: 0.9, max_results: 3 },
            },
            baseDir,
            {
                LORE_DATABASE_PATH: "other",
                LORE_FUZZY_THRESHOLD: "0.25",
                LORE_MAX_RESULTS: "7",
            },
        );
        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.data.databasePath).toBe(
                path.resolve(baseDir, "other"),
            );
            expect(result.data.search.fuzzyThreshold).toBe(0.25);
            expect(result.data.search.maxResults).toBe(7);
        }
    });
    test("parse.errors", () => {
        const cases: [unknown, string][] = [
            [[], "Configuration must be a JSON object"],
            [{}, "database_path is required"],
            [
                { database_path: "db", categories: "characters" },
                "categories must be a list",
            ],
            [
                { database_path: "db", categories: ["planets"] },
                "categories: unknown category 'planets'",
            ],
            [
                { database_path: "db", search_settings: { fuzzy_threshold: 1.5 } },
                "fuzzy_threshold must be between 0 and 1",
            ],
            [
                { database_path: "db", search_settings: { fuzzy_threshold: "high" } },
                "fuzzy_threshold must be a number",
            ],
            [
                { database_path: "db", search_settings: { max_results: 2.5 } },
                "max_results must be a positive integer",
            ],
            [
                {
                    database_path: "db",
                    search_settings: { include_relationships: "yes" },
                },
                "include_relationships must be true or false",
            ],
            [
                {
                    database_path: "db",
                    suggestion_settings: { default_limit: 0 },
                },
                "default_limit must be a positive integer",
            ],
        ];
        for (const [raw, message] of cases) {
            const result = parseLoreConfig(raw, baseDir);
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.message).toBe(message);
            }
        }
    });
    test("parse.badEnvironment", () => {
        const result = parseLoreConfig({ database_path: "db" }, baseDir, {
            LORE_MAX_RESULTS: "abc",
        });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.message).toBe("max_results must be a number");
        }
    });
    test("load", () => {
        const result = loadLoreConfig(
            path.join(dataPath, "lore.config.json"),
            {},
        );
        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.data).toEqual({
                databasePath: path.join(dataPath, "corpus"),
                categories: ["characters", "locations", "events"],
                search: {
                    fuzzyThreshold: 0.3,
                    maxResults: 10,
                    includeRelationships: true,
                },
                suggestions: { minSimilarity: 0.2, defaultLimit: 3 },
            });
        }
    });
    test("load.missing", () => {
        const configPath = path.join(dataPath, "missing.json");
        const result = loadLoreConfig(configPath, {});
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.message).toBe(
                `Configuration file not found: ${configPath}`,
            );
        }
    });
    test("load.invalidJson", () => {
        const result = loadLoreConfig(
            path.join(dataPath, "corpus", "events.json"),
            {},
        );
        expect(result.success).toBe(false);
    });
    test("engineFromConfig", () => {
        const config = loadLoreConfig(
            path.join(dataPath, "lore.config.json"),
            {},
        );
        expect(config.success).toBe(true);
        if (!config.success) {
            return;
        }
        const engine = createLoreQueryEngine(config.data);
        expect(engine.lastBuild.entryCount).toBe(3);
        expect(engine.lastBuild.skippedEntries).toEqual([]);
        expect(
            engine.lastBuild.unavailableCategories.map((c) => c.category),
        ).toEqual(["events"]);

        const hits = engine.search("mage");
        expect(hits.map((h) => h.entry.id)).toEqual(["villain", "hero"]);
        expect(hits[1].relationships?.map((r) => r.targetId)).toEqual([
            "city",
        ]);
        expect(engine.getEntry("hero")?.metadata).toEqual({
            author: "test-author",
            version: 1,
        });
    });
});
