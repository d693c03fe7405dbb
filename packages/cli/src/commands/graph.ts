// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Command, Flags } from "@oclif/core";
import chalk from "chalk";
import fs from "node:fs";
import { configFlag, openEngine } from "../engine.js";

export default class GraphCommand extends Command {
    static flags = {
        config: configFlag,
        id: Flags.string({
            description: "Restrict to the subgraph between these entries",
            multiple: true,
        }),
        output: Flags.file({
            char: "o",
            description: "Write the graph JSON to this file",
        }),
    };

    static description = "Export the relationship graph as JSON";

    async run(): Promise<void> {
        const { flags } = await this.parse(GraphCommand);
        const engine = openEngine(flags.config);
        if (!engine.success) {
            return this.error(engine.message);
        }
        const view = engine.data.graphView(flags.id);
        const json = JSON.stringify(view, null, 2);
        if (flags.output) {
            fs.writeFileSync(flags.output, json, "utf-8");
            console.log(
                chalk.green(
                    `Wrote ${view.nodes.length} nodes and ${view.edges.length} edges to ${flags.output}`,
                ),
            );
        } else {
            console.log(json);
        }
    }
}
