// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Args, Command, Flags } from "@oclif/core";
import chalk from "chalk";
import { configFlag, openEngine } from "../engine.js";
import { formatSuggestion } from "../format.js";

export default class SuggestCommand extends Command {
    static args = {
        id: Args.string({
            description: "Id of the entry to find similar entries for",
            required: true,
        }),
    };

    static flags = {
        config: configFlag,
        limit: Flags.integer({
            description: "Maximum number of suggestions",
            min: 1,
        }),
    };

    static description =
        "Suggest entries that look related by tags and content";

    async run(): Promise<void> {
        const { args, flags } = await this.parse(SuggestCommand);
        const engine = openEngine(flags.config);
        if (!engine.success) {
            return this.error(engine.message);
        }
        if (!engine.data.getEntry(args.id)) {
            return this.error(`Entry not found: ${args.id}`);
        }
        const suggestions = engine.data.suggest(args.id, flags.limit);
        if (suggestions.length === 0) {
            console.log(chalk.yellow("No suggestions"));
            return;
        }
        for (const suggestion of suggestions) {
            console.log(formatSuggestion(suggestion));
        }
    }
}
