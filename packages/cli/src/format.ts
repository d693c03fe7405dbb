// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import chalk from "chalk";
import {
    BuildReport,
    LoreStatistics,
    RelatedEntry,
    SearchHit,
    Suggestion,
} from "lore-index";

export const MAX_DESCRIPTION_LENGTH = 200;

export function truncate(
    text: string,
    maxLength: number = MAX_DESCRIPTION_LENGTH,
): string {
    return text.length > maxLength ? text.slice(0, maxLength) + "..." : text;
}

export function formatSearchHit(hit: SearchHit, rank: number): string[] {
    const { entry } = hit;
    const lines = [
        `${rank}. ${chalk.bold(entry.name)} ${chalk.magenta(`[${entry.category}]`)} ${chalk.green(hit.score.toFixed(2))}`,
        `   ${chalk.gray(`id: ${entry.id}`)}`,
    ];
    if (entry.description.length > 0) {
        lines.push(`   ${truncate(entry.description)}`);
    }
    if (entry.tags.length > 0) {
        lines.push(`   tags: ${entry.tags.join(", ")}`);
    }
    if (hit.relationships) {
        for (const rel of hit.relationships) {
            lines.push(`   -> ${rel.relationshipType} ${rel.targetId}`);
        }
    }
    return lines;
}

export function formatRelatedEntry(related: RelatedEntry): string {
    const indent = "  ".repeat(related.depth - 1);
    return `${indent}${chalk.yellow(`[${related.depth}]`)} ${related.relationship.sourceId} ${chalk.cyan(related.relationshipType)} ${chalk.bold(related.entry.name)} (${related.entry.id})`;
}

export function formatSuggestion(suggestion: Suggestion): string {
    return `${chalk.bold(suggestion.entry.name)} (${suggestion.entry.id}) ${chalk.green(suggestion.similarityScore.toFixed(2))}`;
}

export function formatStatistics(stats: LoreStatistics): string[] {
    const lines = [
        `Total entries: ${stats.totalEntries}`,
        `Total relationships: ${stats.totalRelationships}`,
    ];
    const categories = Object.entries(stats.perCategoryCounts);
    if (categories.length > 0) {
        lines.push(chalk.cyan("Entries by category:"));
        for (const [category, count] of categories) {
            lines.push(`  ${category.padEnd(14)}${count}`);
        }
    }
    if (stats.orphanedEntryIds.length > 0) {
        lines.push(
            chalk.yellow(`Orphaned entries: ${stats.orphanedEntryIds.join(", ")}`),
        );
    }
    for (const ref of stats.brokenReferences) {
        lines.push(
            chalk.red(
                `Broken reference: ${ref.sourceId} ${ref.relationshipType} ${ref.targetId}`,
            ),
        );
    }
    return lines;
}

/**
 * Warnings for entries and categories the last build had to skip
 */
export function formatBuildWarnings(report: BuildReport): string[] {
    const lines: string[] = [];
    for (const skipped of report.skippedEntries) {
        lines.push(
            chalk.yellow(
                `Skipped ${skipped.category}/${skipped.entryId}: ${skipped.reason}`,
            ),
        );
    }
    return lines;
}
