// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/**
 * lore-index
 *
 * In-memory index and relationship graph over a file-backed corpus of lore
 * entries: fuzzy search, relationship traversal, similarity suggestions and
 * statistics.
 */

// Core types
export * from "./types.js";

// Entries and stores
export {
    StoredEntry,
    isRecord,
    parseEntry,
    toStoredEntry,
} from "./entry.js";
export {
    CategoryEntries,
    IEntryStore,
    FileEntryStore,
    MemoryEntryStore,
} from "./entryStore.js";

// Text and similarity
export { buildSearchableText } from "./searchableText.js";
export { ratio, partialRatio } from "./fuzzy.js";

// Index + graph
export { RelationshipGraph } from "./relationshipGraph.js";
export {
    buildLoreIndex,
    copyIndexedEntry,
    LoreIndex,
    BuildResult,
} from "./indexBuilder.js";

// Queries
export { scoreEntry, searchIndex, SearchSettings } from "./search.js";
export { findRelated } from "./navigator.js";
export {
    entrySimilarity,
    suggestSimilar,
    SuggestionSettings,
} from "./recommender.js";
export { computeStatistics } from "./statistics.js";

// Configuration
export {
    LoreConfig,
    LoreEnvironment,
    loadLoreConfig,
    parseLoreConfig,
    createSearchSettings,
    createSuggestionSettings,
} from "./config.js";

// Engine
export {
    LoreQueryEngine,
    QueryEngineSettings,
    createLoreQueryEngine,
} from "./queryEngine.js";
