// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import dotenv from "dotenv";
dotenv.config();

import { Flags } from "@oclif/core";
import {
    createLoreQueryEngine,
    loadLoreConfig,
    LoreQueryEngine,
} from "lore-index";
import { Result, success } from "typechat";

import registerDebug from "debug";
const debug = registerDebug("lore-cli");

export const DEFAULT_CONFIG_PATH = "lore.config.json";

export const configFlag = Flags.string({
    char: "c",
    description: "Path to the lore configuration file",
    env: "LORE_CONFIG",
    default: DEFAULT_CONFIG_PATH,
});

export function openEngine(configPath: string): Result<LoreQueryEngine> {
    const config = loadLoreConfig(configPath);
    if (!config.success) {
        return config;
    }
    debug("Opening %s", config.data.databasePath);
    return success(createLoreQueryEngine(config.data));
}
