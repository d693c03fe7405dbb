// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Command } from "@oclif/core";
import { configFlag, openEngine } from "../engine.js";
import { formatBuildWarnings, formatStatistics } from "../format.js";

export default class StatsCommand extends Command {
    static flags = {
        config: configFlag,
    };

    static description = "Index size, category counts and orphaned entries";

    async run(): Promise<void> {
        const { flags } = await this.parse(StatsCommand);
        const engine = openEngine(flags.config);
        if (!engine.success) {
            return this.error(engine.message);
        }
        const lines = [
            ...formatBuildWarnings(engine.data.lastBuild),
            ...formatStatistics(engine.data.statistics()),
        ];
        console.log(lines.join("\n"));
    }
}
