// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import * as fs from "fs";
import * as path from "path";
import { Result, error, success } from "typechat";
import { isRecord } from "./entry.js";
import { SuggestionSettings } from "./recommender.js";
import { SearchSettings } from "./search.js";
import { isLoreCategory, loreCategories, LoreCategory } from "./types.js";

import registerDebug from "debug";
const debug = registerDebug("lore-index:config");

export interface LoreConfig {
    /** Directory holding one <category>.json file per category */
    databasePath: string;
    categories: LoreCategory[];
    search: SearchSettings;
    suggestions: SuggestionSettings;
}

export type LoreEnvironment = Record<string, string | undefined>;

export function createSearchSettings(): SearchSettings {
    return {
        fuzzyThreshold: 0.4,
        maxResults: 20,
        includeRelationships: false,
    };
}

export function createSuggestionSettings(): SuggestionSettings {
    return {
        minSimilarity: 0.3,
        defaultLimit: 5,
    };
}

/**
 * Load a JSON config file. database_path is resolved relative to the file.
 * LORE_DATABASE_PATH, LORE_FUZZY_THRESHOLD and LORE_MAX_RESULTS override
 * the file.
 */
export function loadLoreConfig(
    configPath: string,
    env: LoreEnvironment = process.env,
): Result<LoreConfig> {
    if (!fs.existsSync(configPath)) {
        return error(`Configuration file not found: ${configPath}`);
    }
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (ex) {
        return error(`Could not read ${configPath}: ${ex}`);
    }
    debug("Loaded config from %s", configPath);
    return parseLoreConfig(raw, path.dirname(path.resolve(configPath)), env);
}

export function parseLoreConfig(
    raw: unknown,
    baseDir: string,
    env: LoreEnvironment = {},
): Result<LoreConfig> {
    if (!isRecord(raw)) {
        return error("Configuration must be a JSON object");
    }

    const databasePath = env.LORE_DATABASE_PATH ?? raw.database_path;
    if (typeof databasePath !== "string" || databasePath.length === 0) {
        return error("database_path is required");
    }

    let categories: LoreCategory[] = [...loreCategories];
    const rawCategories: unknown = raw.categories;
    if (rawCategories !== undefined) {
        if (!Array.isArray(rawCategories)) {
            return error("categories must be a list");
        }
        categories = [];
        for (const item of rawCategories) {
            const category: unknown = item;
            if (typeof category !== "string" || !isLoreCategory(category)) {
                return error(
                    `categories: unknown category '${String(category)}'`,
                );
            }
            categories.push(category);
        }
    }

    const search = createSearchSettings();
    const searchSettings = raw.search_settings ?? {};
    if (!isRecord(searchSettings)) {
        return error("search_settings must be an object");
    }
    const threshold = readNumber(
        "fuzzy_threshold",
        env.LORE_FUZZY_THRESHOLD ?? searchSettings.fuzzy_threshold,
        search.fuzzyThreshold,
    );
    if (!threshold.success) {
        return threshold;
    }
    if (threshold.data < 0 || threshold.data > 1) {
        return error("fuzzy_threshold must be between 0 and 1");
    }
    search.fuzzyThreshold = threshold.data;

    const maxResults = readNumber(
        "max_results",
        env.LORE_MAX_RESULTS ?? searchSettings.max_results,
        search.maxResults,
    );
    if (!maxResults.success) {
        return maxResults;
    }
    if (!Number.isInteger(maxResults.data) || maxResults.data <= 0) {
        return error("max_results must be a positive integer");
    }
    search.maxResults = maxResults.data;

    const includeRelationships = searchSettings.include_relationships;
    if (includeRelationships !== undefined) {
        if (typeof includeRelationships !== "boolean") {
            return error("include_relationships must be true or false");
        }
        search.includeRelationships = includeRelationships;
    }

    const suggestions = createSuggestionSettings();
    const suggestionSettings = raw.suggestion_settings ?? {};
    if (!isRecord(suggestionSettings)) {
        return error("suggestion_settings must be an object");
    }
    const minSimilarity = readNumber(
        "min_similarity",
        suggestionSettings.min_similarity,
        suggestions.minSimilarity,
    );
    if (!minSimilarity.success) {
        return minSimilarity;
    }
    suggestions.minSimilarity = minSimilarity.data;
    const defaultLimit = readNumber(
        "default_limit",
        suggestionSettings.default_limit,
        suggestions.defaultLimit,
    );
    if (!defaultLimit.success) {
        return defaultLimit;
    }
    if (!Number.isInteger(defaultLimit.data) || defaultLimit.data <= 0) {
        return error("default_limit must be a positive integer");
    }
    suggestions.defaultLimit = defaultLimit.data;

    return success({
        databasePath: path.resolve(baseDir, databasePath),
        categories,
        search,
        suggestions,
    });
}

/**
 * Numbers may come from JSON (number) or the environment (string)
 */
function readNumber(
    key: string,
    value: unknown,
    defaultValue: number,
): Result<number> {
    if (value === undefined) {
        return success(defaultValue);
    }
    const num =
        typeof value === "string" && value.trim().length > 0
            ? Number(value)
            : value;
    if (typeof num !== "number" || Number.isNaN(num)) {
        return error(`${key} must be a number`);
    }
    return success(num);
}
