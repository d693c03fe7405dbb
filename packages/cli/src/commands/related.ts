// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Args, Command, Flags } from "@oclif/core";
import chalk from "chalk";
import { relationshipTypes } from "lore-index";
import { configFlag, openEngine } from "../engine.js";
import { formatRelatedEntry } from "../format.js";

export default class RelatedCommand extends Command {
    static args = {
        id: Args.string({
            description: "Id of the entry to start from",
            required: true,
        }),
    };

    static flags = {
        config: configFlag,
        type: Flags.string({
            description: "Only follow relationships of this type",
            options: [...relationshipTypes],
        }),
        depth: Flags.integer({
            description: "How many relationship hops to follow",
            min: 1,
            default: 1,
        }),
    };

    static description = "List entries reachable through relationships";

    async run(): Promise<void> {
        const { args, flags } = await this.parse(RelatedCommand);
        const engine = openEngine(flags.config);
        if (!engine.success) {
            return this.error(engine.message);
        }
        if (!engine.data.getEntry(args.id)) {
            return this.error(`Entry not found: ${args.id}`);
        }
        const related = engine.data.related(args.id, {
            relationshipType: relationshipTypes.find((t) => t === flags.type),
            maxDepth: flags.depth,
        });
        if (related.length === 0) {
            console.log(chalk.yellow("No related entries"));
            return;
        }
        for (const item of related) {
            console.log(formatRelatedEntry(item));
        }
    }
}
