// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { CustomFieldValue, LoreEntry } from "./types.js";

/**
 * Lower-cased text used for full-text matching:
 * name, description, tags, then custom field values in field order.
 */
export function buildSearchableText(entry: LoreEntry): string {
    const parts: string[] = [entry.name, entry.description, ...entry.tags];
    for (const field of Object.values(entry.customFields)) {
        parts.push(...customFieldText(field));
    }
    return parts
        .filter((part) => part.length > 0)
        .join(" ")
        .toLowerCase();
}

function customFieldText(field: CustomFieldValue): string[] {
    switch (field.type) {
        case "string":
            return [field.value];
        case "number":
        case "boolean":
            return [String(field.value)];
        case "list":
            return field.value;
    }
}
