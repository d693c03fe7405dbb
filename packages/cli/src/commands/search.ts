// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Args, Command, Flags } from "@oclif/core";
import chalk from "chalk";
import { loreCategories } from "lore-index";
import { configFlag, openEngine } from "../engine.js";
import { formatBuildWarnings, formatSearchHit } from "../format.js";

export default class SearchCommand extends Command {
    static args = {
        query: Args.string({
            description: "Free text to search for",
            required: true,
        }),
    };

    static flags = {
        config: configFlag,
        category: Flags.string({
            description: "Only search this category",
            options: [...loreCategories],
        }),
        tag: Flags.string({
            description: "Only entries carrying one of these tags",
            multiple: true,
        }),
        limit: Flags.integer({
            description: "Maximum number of results",
            min: 1,
        }),
    };

    static description = "Fuzzy search over lore entries";
    static examples = [
        `$ <%= config.bin %> <%= command.id %> mage --category characters`,
    ];

    async run(): Promise<void> {
        const { args, flags } = await this.parse(SearchCommand);
        const engine = openEngine(flags.config);
        if (!engine.success) {
            return this.error(engine.message);
        }
        formatBuildWarnings(engine.data.lastBuild).forEach((line) =>
            console.log(line),
        );
        const hits = engine.data.search(args.query, {
            category: loreCategories.find((c) => c === flags.category),
            tags: flags.tag,
            limit: flags.limit,
        });
        if (hits.length === 0) {
            console.log(chalk.yellow("No results found"));
            return;
        }
        hits.forEach((hit, i) => {
            console.log(formatSearchHit(hit, i + 1).join("\n"));
        });
    }
}
