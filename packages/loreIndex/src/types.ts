// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/**
 * lore-index — core types
 *
 * Entries are read from a store, parsed into LoreEntry, and projected into
 * an Index (id → IndexedEntry) and a directed Relationship Graph.
 */

// =========================================================================
// Categories & Relationship Types
// =========================================================================

export const loreCategories = [
    "characters",
    "locations",
    "events",
    "organizations",
    "items",
    "concepts",
    "creatures",
    "cultures",
    "technology",
    "magic",
] as const;

export type LoreCategory = (typeof loreCategories)[number];

export const relationshipTypes = [
    "located_in",
    "part_of",
    "member_of",
    "ally_of",
    "enemy_of",
    "parent_of",
    "child_of",
    "successor_of",
    "created_by",
    "owns",
    "participated_in",
    "related_to",
] as const;

export type RelationshipType = (typeof relationshipTypes)[number];

export function isLoreCategory(value: string): value is LoreCategory {
    return loreCategories.some((category) => category === value);
}

export function isRelationshipType(value: string): value is RelationshipType {
    return relationshipTypes.some((type) => type === value);
}

export const DEFAULT_RELATIONSHIP_STRENGTH = 5.0;
export const MIN_RELATIONSHIP_STRENGTH = 0;
export const MAX_RELATIONSHIP_STRENGTH = 10;

// =========================================================================
// Entries
// =========================================================================

export type CustomFieldValue =
    | { type: "string"; value: string }
    | { type: "number"; value: number }
    | { type: "boolean"; value: boolean }
    | { type: "list"; value: string[] };

export interface RelationshipDeclaration {
    targetId: string;
    relationshipType: RelationshipType;
    description?: string;
    /** 0..10. Stored, exported, never used for scoring */
    strength: number;
}

export interface EntryMetadata {
    createdDate?: string;
    modifiedDate?: string;
    author?: string;
    version?: number;
    status?: string;
}

export interface LoreEntry {
    id: string;
    name: string;
    category: LoreCategory;
    subcategory?: string;
    description: string;
    /** Kept in declaration order */
    tags: string[];
    relationships: RelationshipDeclaration[];
    customFields: Record<string, CustomFieldValue>;
    metadata: EntryMetadata;
}

/**
 * An entry as held by the Index: the entry plus its derived, lower-cased
 * searchable text.
 */
export interface IndexedEntry extends LoreEntry {
    searchableText: string;
}

// =========================================================================
// Relationship Graph
// =========================================================================

export interface RelationshipEdge {
    sourceId: string;
    targetId: string;
    relationshipType: RelationshipType;
    strength: number;
    description: string;
}

export interface GraphNode {
    id: string;
    name: string;
    category: LoreCategory;
}

export interface GraphView {
    nodes: GraphNode[];
    edges: RelationshipEdge[];
}

// =========================================================================
// Query Results
// =========================================================================

export interface SearchOptions {
    category?: LoreCategory;
    /** Any-of: an entry must carry at least one of these tags */
    tags?: string[];
    limit?: number;
}

export interface SearchHit {
    entry: IndexedEntry;
    /** Relevance capped to 0..100 */
    score: number;
    /** Outgoing edges, present when includeRelationships is set */
    relationships?: RelationshipEdge[];
}

export interface RelatedOptions {
    relationshipType?: RelationshipType;
    maxDepth?: number;
}

export interface RelatedEntry {
    entry: IndexedEntry;
    /** The edge that first reached this entry */
    relationship: RelationshipEdge;
    relationshipType: RelationshipType;
    depth: number;
}

export interface Suggestion {
    entry: IndexedEntry;
    similarityScore: number;
}

export interface BrokenReference {
    sourceId: string;
    targetId: string;
    relationshipType: RelationshipType;
}

export interface LoreStatistics {
    totalEntries: number;
    perCategoryCounts: Partial<Record<LoreCategory, number>>;
    totalRelationships: number;
    orphanedEntryIds: string[];
    brokenReferences: BrokenReference[];
}

// =========================================================================
// Build Reporting
// =========================================================================

export interface SkippedEntry {
    category: LoreCategory;
    entryId: string;
    reason: string;
}

export interface UnavailableCategory {
    category: LoreCategory;
    reason: string;
}

export interface BuildReport {
    entryCount: number;
    relationshipCount: number;
    skippedEntries: SkippedEntry[];
    unavailableCategories: UnavailableCategory[];
    elapsedMs: number;
}
