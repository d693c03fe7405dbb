// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import * as fs from "fs";
import * as path from "path";
import { Result, error, success } from "typechat";
import { isRecord, toStoredEntry } from "./entry.js";
import { LoreCategory, LoreEntry } from "./types.js";

import registerDebug from "debug";
const debug = registerDebug("lore-index:store");

/**
 * Raw entries of one category, keyed by entry id
 */
export type CategoryEntries = Record<string, unknown>;

/**
 * Read-only source of persisted entries.
 * An error result means the category is unavailable (missing or unreadable).
 */
export interface IEntryStore {
    readCategory(category: LoreCategory): Result<CategoryEntries>;
}

/**
 * One JSON file per category: <databasePath>/<category>.json holding
 * { "entries": { "<id>": {...} }, "metadata": {...} }
 */
export class FileEntryStore implements IEntryStore {
    constructor(public readonly databasePath: string) {}

    public getCategoryPath(category: LoreCategory): string {
        return path.join(this.databasePath, `${category}.json`);
    }

    public readCategory(category: LoreCategory): Result<CategoryEntries> {
        const filePath = this.getCategoryPath(category);
        if (!fs.existsSync(filePath)) {
            return error(`${filePath} not found`);
        }
        let data: unknown;
        try {
            data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
        } catch (ex) {
            return error(`${filePath} could not be read: ${ex}`);
        }
        if (!isRecord(data)) {
            return error(`${filePath} is not a category file`);
        }
        const entries = data.entries ?? {};
        if (!isRecord(entries)) {
            return error(`${filePath} has no entries map`);
        }
        debug(
            "Read %d entries from %s",
            Object.keys(entries).length,
            filePath,
        );
        return success(entries);
    }
}

/**
 * In-memory store. Holds raw records so tests and embedders can also place
 * malformed data.
 */
export class MemoryEntryStore implements IEntryStore {
    private categories: Map<LoreCategory, Map<string, unknown>> = new Map();
    private unavailable: Map<LoreCategory, string> = new Map();

    constructor(entries?: LoreEntry[]) {
        if (entries) {
            for (const entry of entries) {
                this.put(entry);
            }
        }
    }

    public put(entry: LoreEntry): void {
        this.putRaw(entry.category, entry.id, toStoredEntry(entry));
    }

    public putRaw(
        category: LoreCategory,
        id: string,
        raw: unknown,
    ): void {
        let entries = this.categories.get(category);
        if (!entries) {
            entries = new Map();
            this.categories.set(category, entries);
        }
        entries.set(id, raw);
    }

    public remove(category: LoreCategory, id: string): boolean {
        return this.categories.get(category)?.delete(id) ?? false;
    }

    /**
     * Make reads of a category fail until cleared with reason undefined
     */
    public setUnavailable(category: LoreCategory, reason?: string): void {
        if (reason === undefined) {
            this.unavailable.delete(category);
        } else {
            this.unavailable.set(category, reason);
        }
    }

    public readCategory(category: LoreCategory): Result<CategoryEntries> {
        const reason = this.unavailable.get(category);
        if (reason !== undefined) {
            return error(reason);
        }
        const entries = this.categories.get(category);
        return success(entries ? Object.fromEntries(entries) : {});
    }
}
