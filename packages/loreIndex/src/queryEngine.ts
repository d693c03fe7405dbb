// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    createSearchSettings,
    createSuggestionSettings,
    LoreConfig,
} from "./config.js";
import { FileEntryStore, IEntryStore } from "./entryStore.js";
import {
    buildLoreIndex,
    copyIndexedEntry,
    LoreIndex,
} from "./indexBuilder.js";
import { findRelated } from "./navigator.js";
import { suggestSimilar, SuggestionSettings } from "./recommender.js";
import { searchIndex, SearchSettings } from "./search.js";
import { computeStatistics } from "./statistics.js";
import {
    BuildReport,
    GraphView,
    IndexedEntry,
    loreCategories,
    LoreCategory,
    LoreStatistics,
    RelatedEntry,
    RelatedOptions,
    SearchHit,
    SearchOptions,
    Suggestion,
} from "./types.js";

export interface QueryEngineSettings {
    categories?: readonly LoreCategory[];
    search?: Partial<SearchSettings>;
    suggestions?: Partial<SuggestionSettings>;
}

/**
 * Owns the current Index + Graph snapshot and answers queries over it.
 *
 * The snapshot is built at construction and replaced, never edited, by
 * refresh(). Reads between a store change and the next refresh see the
 * previous snapshot.
 */
export class LoreQueryEngine {
    private current: LoreIndex;
    private report: BuildReport;
    private categories: readonly LoreCategory[];
    public readonly searchSettings: SearchSettings;
    public readonly suggestionSettings: SuggestionSettings;

    constructor(
        private store: IEntryStore,
        settings?: QueryEngineSettings,
    ) {
        this.categories = settings?.categories ?? loreCategories;
        this.searchSettings = {
            ...createSearchSettings(),
            ...settings?.search,
        };
        this.suggestionSettings = {
            ...createSuggestionSettings(),
            ...settings?.suggestions,
        };
        const { index, report } = buildLoreIndex(this.store, this.categories);
        this.current = index;
        this.report = report;
    }

    /**
     * Report of the build that produced the current snapshot
     */
    public get lastBuild(): BuildReport {
        return this.report;
    }

    public get size(): number {
        return this.current.entries.size;
    }

    /**
     * Rebuild Index and Graph from the store and swap them in
     */
    public refresh(): BuildReport {
        const { index, report } = buildLoreIndex(this.store, this.categories);
        this.current = index;
        this.report = report;
        return report;
    }

    public getEntry(entryId: string): IndexedEntry | undefined {
        const entry = this.current.entries.get(entryId);
        return entry ? copyIndexedEntry(entry) : undefined;
    }

    public *entries(): IterableIterator<IndexedEntry> {
        for (const entry of this.current.entries.values()) {
            yield copyIndexedEntry(entry);
        }
    }

    public search(query: string, options?: SearchOptions): SearchHit[] {
        return searchIndex(this.current, query, this.searchSettings, options);
    }

    public related(entryId: string, options?: RelatedOptions): RelatedEntry[] {
        return findRelated(this.current, entryId, options);
    }

    public suggest(entryId: string, limit?: number): Suggestion[] {
        return suggestSimilar(
            this.current,
            entryId,
            this.suggestionSettings,
            limit,
        );
    }

    public statistics(): LoreStatistics {
        return computeStatistics(this.current);
    }

    /**
     * The whole graph, or the subgraph induced by entryIds. Always a copy.
     */
    public graphView(entryIds?: string[]): GraphView {
        return this.current.graph.view(entryIds);
    }
}

/**
 * Engine over the file store a configuration points at
 */
export function createLoreQueryEngine(config: LoreConfig): LoreQueryEngine {
    return new LoreQueryEngine(new FileEntryStore(config.databasePath), {
        categories: config.categories,
        search: config.search,
        suggestions: config.suggestions,
    });
}
