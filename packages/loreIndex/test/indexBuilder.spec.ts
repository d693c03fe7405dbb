// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { MemoryEntryStore } from "../src/entryStore.js";
import { buildLoreIndex } from "../src/indexBuilder.js";
import { LoreQueryEngine } from "../src/queryEngine.js";
import { createScenarioStore, makeEntry } from "./testCommon.js";

describe("indexBuilder", () => {
    test("build", () => {
        const { index, report } = buildLoreIndex(createScenarioStore());
        expect(report.entryCount).toBe(3);
        expect(report.relationshipCount).toBe(1);
        expect(report.skippedEntries).toEqual([]);
        expect(report.unavailableCategories).toEqual([]);
        // Category order, then store order
        expect([...index.entries.keys()]).toEqual(["hero", "villain", "city"]);
        expect(index.entries.get("hero")?.searchableText).toBe(
            "aldric wandering scholar mage zeloria",
        );
        expect(index.graph.nodeCount).toBe(3);
        expect(index.graph.successors("hero")).toEqual([
            {
                sourceId: "hero",
                targetId: "city",
                relationshipType: "located_in",
                strength: 5,
                description: "",
            },
        ]);
    });
    test("build.empty", () => {
        const { index, report } = buildLoreIndex(new MemoryEntryStore());
        expect(index.entries.size).toBe(0);
        expect(index.graph.edgeCount).toBe(0);
        expect(report.entryCount).toBe(0);
    });
    test("build.skipsMalformed", () => {
        const store = createScenarioStore();
        store.putRaw("characters", "broken", { description: "no name" });
        store.putRaw("characters", "badRel", {
            name: "Bad",
            relationships: [
                { target_id: "city", relationship_type: "friend_of" },
            ],
        });
        const { index, report } = buildLoreIndex(store);
        expect(report.entryCount).toBe(3);
        expect(index.entries.has("broken")).toBe(false);
        expect(report.skippedEntries).toEqual([
            { category: "characters", entryId: "broken", reason: "missing name" },
            {
                category: "characters",
                entryId: "badRel",
                reason: "relationship 0 has unknown type 'friend_of'",
            },
        ]);
    });
    test("build.duplicateId", () => {
        const store = createScenarioStore();
        store.putRaw("items", "hero", { name: "Hero's Blade" });
        const { index, report } = buildLoreIndex(store);
        expect(index.entries.get("hero")?.name).toBe("Aldric");
        expect(report.skippedEntries).toEqual([
            { category: "items", entryId: "hero", reason: "duplicate id" },
        ]);
    });
    test("build.unavailableCategory", () => {
        const store = createScenarioStore();
        store.setUnavailable("locations", "disk error");
        const { index, report } = buildLoreIndex(store);
        expect(report.entryCount).toBe(2);
        expect(report.unavailableCategories).toEqual([
            { category: "locations", reason: "disk error" },
        ]);
        // The edge is kept; its target is a broken reference
        expect(index.graph.edgeCount).toBe(1);
        expect(index.graph.hasNode("city")).toBe(false);
    });
    test("build.categorySubset", () => {
        const { index, report } = buildLoreIndex(createScenarioStore(), [
            "locations",
        ]);
        expect([...index.entries.keys()]).toEqual(["city"]);
        expect(report.relationshipCount).toBe(0);
    });
    test("refresh.idempotent", () => {
        const engine = new LoreQueryEngine(createScenarioStore());
        const entries = [...engine.entries()];
        const graph = engine.graphView();
        engine.refresh();
        engine.refresh();
        expect([...engine.entries()]).toEqual(entries);
        expect(engine.graphView()).toEqual(graph);
    });
    test("refresh.picksUpChanges", () => {
        const store = createScenarioStore();
        const engine = new LoreQueryEngine(store);
        store.put(makeEntry("keep", "locations", "Stormkeep"));
        store.remove("characters", "villain");
        expect(engine.getEntry("keep")).toBeUndefined();
        expect(engine.getEntry("villain")).toBeDefined();

        const report = engine.refresh();
        expect(report.entryCount).toBe(3);
        expect(engine.lastBuild).toBe(report);
        expect(engine.getEntry("keep")?.name).toBe("Stormkeep");
        expect(engine.getEntry("villain")).toBeUndefined();
    });
});
