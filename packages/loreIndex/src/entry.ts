// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Result, error, success } from "typechat";
import {
    CustomFieldValue,
    DEFAULT_RELATIONSHIP_STRENGTH,
    EntryMetadata,
    isLoreCategory,
    isRelationshipType,
    LoreCategory,
    LoreEntry,
    MAX_RELATIONSHIP_STRENGTH,
    MIN_RELATIONSHIP_STRENGTH,
    RelationshipDeclaration,
} from "./types.js";

/**
 * Raw record as persisted in a category file (snake_case keys).
 */
export type StoredEntry = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse one stored record into a LoreEntry.
 * @param raw the record found under `key` in the category file
 * @param key identifier the record is stored under
 * @param category category of the file the record was read from
 */
export function parseEntry(
    raw: unknown,
    key: string,
    category: LoreCategory,
): Result<LoreEntry> {
    if (!isRecord(raw)) {
        return error("entry is not an object");
    }
    const id = raw.id ?? key;
    if (typeof id !== "string" || id !== key) {
        return error(`id does not match its key '${key}'`);
    }

    const entryCategory = raw.category ?? category;
    if (typeof entryCategory !== "string" || !isLoreCategory(entryCategory)) {
        return error(`unknown category '${String(entryCategory)}'`);
    }
    if (entryCategory !== category) {
        return error(
            `category '${entryCategory}' stored in '${category}' file`,
        );
    }

    const name = raw.name;
    if (typeof name !== "string" || name.length === 0) {
        return error("missing name");
    }
    const description = raw.description ?? "";
    if (typeof description !== "string") {
        return error("description is not a string");
    }
    const subcategory = raw.subcategory;
    if (subcategory !== undefined && typeof subcategory !== "string") {
        return error("subcategory is not a string");
    }

    const tags = raw.tags ?? [];
    if (!isStringArray(tags)) {
        return error("tags must be a list of strings");
    }

    const relationships = parseRelationships(raw.relationships ?? []);
    if (!relationships.success) {
        return relationships;
    }

    const entry: LoreEntry = {
        id,
        name,
        category: entryCategory,
        description,
        tags: [...tags],
        relationships: relationships.data,
        customFields: parseCustomFields(raw.custom_fields),
        metadata: parseMetadata(raw.metadata),
    };
    if (subcategory !== undefined) {
        entry.subcategory = subcategory;
    }
    return success(entry);
}

function parseRelationships(
    raw: unknown,
): Result<RelationshipDeclaration[]> {
    if (!Array.isArray(raw)) {
        return error("relationships must be a list");
    }
    const relationships: RelationshipDeclaration[] = [];
    for (let i = 0; i < raw.length; ++i) {
        const rel: unknown = raw[i];
        if (!isRecord(rel)) {
            return error(`relationship ${i} is not an object`);
        }
        const targetId = rel.target_id;
        if (typeof targetId !== "string" || targetId.length === 0) {
            return error(`relationship ${i} has no target_id`);
        }
        const relType = rel.relationship_type;
        if (typeof relType !== "string" || !isRelationshipType(relType)) {
            return error(
                `relationship ${i} has unknown type '${String(relType)}'`,
            );
        }
        const strength = rel.strength ?? DEFAULT_RELATIONSHIP_STRENGTH;
        if (
            typeof strength !== "number" ||
            Number.isNaN(strength) ||
            strength < MIN_RELATIONSHIP_STRENGTH ||
            strength > MAX_RELATIONSHIP_STRENGTH
        ) {
            return error(`relationship ${i} has strength out of range`);
        }
        const declaration: RelationshipDeclaration = {
            targetId,
            relationshipType: relType,
            strength,
        };
        if (typeof rel.description === "string") {
            declaration.description = rel.description;
        }
        relationships.push(declaration);
    }
    return success(relationships);
}

/**
 * Values other than scalars and lists of scalars are dropped.
 */
function parseCustomFields(raw: unknown): Record<string, CustomFieldValue> {
    const fields: Record<string, CustomFieldValue> = {};
    if (!isRecord(raw)) {
        return fields;
    }
    for (const [name, value] of Object.entries(raw)) {
        const field = toCustomFieldValue(value);
        if (field) {
            fields[name] = field;
        }
    }
    return fields;
}

function toCustomFieldValue(value: unknown): CustomFieldValue | undefined {
    switch (typeof value) {
        case "string":
            return { type: "string", value };
        case "number":
            return { type: "number", value };
        case "boolean":
            return { type: "boolean", value };
        default:
            break;
    }
    if (Array.isArray(value)) {
        const items: string[] = [];
        for (const item of value) {
            if (
                typeof item === "string" ||
                typeof item === "number" ||
                typeof item === "boolean"
            ) {
                items.push(String(item));
            }
        }
        return { type: "list", value: items };
    }
    return undefined;
}

function parseMetadata(raw: unknown): EntryMetadata {
    const metadata: EntryMetadata = {};
    if (!isRecord(raw)) {
        return metadata;
    }
    if (typeof raw.created_date === "string") {
        metadata.createdDate = raw.created_date;
    }
    if (typeof raw.modified_date === "string") {
        metadata.modifiedDate = raw.modified_date;
    }
    if (typeof raw.author === "string") {
        metadata.author = raw.author;
    }
    if (typeof raw.version === "number") {
        metadata.version = raw.version;
    }
    if (typeof raw.status === "string") {
        metadata.status = raw.status;
    }
    return metadata;
}

function isStringArray(value: unknown): value is string[] {
    return (
        Array.isArray(value) && value.every((item) => typeof item === "string")
    );
}

/**
 * Inverse of parseEntry: the snake_case record a category file holds.
 */
export function toStoredEntry(entry: LoreEntry): StoredEntry {
    const stored: StoredEntry = {
        id: entry.id,
        name: entry.name,
        category: entry.category,
        description: entry.description,
        tags: [...entry.tags],
        relationships: entry.relationships.map((rel) => {
            const storedRel: Record<string, unknown> = {
                target_id: rel.targetId,
                relationship_type: rel.relationshipType,
                strength: rel.strength,
            };
            if (rel.description !== undefined) {
                storedRel.description = rel.description;
            }
            return storedRel;
        }),
        custom_fields: Object.fromEntries(
            Object.entries(entry.customFields).map(([name, field]) => [
                name,
                field.type === "list" ? [...field.value] : field.value,
            ]),
        ),
        metadata: {
            created_date: entry.metadata.createdDate,
            modified_date: entry.metadata.modifiedDate,
            author: entry.metadata.author,
            version: entry.metadata.version,
            status: entry.metadata.status,
        },
    };
    if (entry.subcategory !== undefined) {
        stored.subcategory = entry.subcategory;
    }
    return stored;
}
