// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import * as levenshtein from "fast-levenshtein";

/**
 * Normalized edit-distance similarity, 0..100 (integer).
 * Returns 0 if either string is empty.
 */
export function ratio(text: string, other: string): number {
    if (text.length === 0 || other.length === 0) {
        return 0;
    }
    if (text === other) {
        return 100;
    }
    const distance: number = levenshtein.get(text, other);
    const maxLength = Math.max(text.length, other.length);
    return Math.round(100 * (1 - distance / maxLength));
}

/**
 * Substring-tolerant similarity, 0..100 (integer).
 * Aligns the shorter string against every window of the longer string with
 * the same length and keeps the best ratio.
 */
export function partialRatio(text: string, other: string): number {
    if (text.length === 0 || other.length === 0) {
        return 0;
    }
    const [shorter, longer] =
        text.length <= other.length ? [text, other] : [other, text];
    if (longer.includes(shorter)) {
        return 100;
    }
    let best = 0;
    const windowCount = longer.length - shorter.length + 1;
    for (let i = 0; i < windowCount; ++i) {
        const score = ratio(shorter, longer.slice(i, i + shorter.length));
        if (score > best) {
            best = score;
        }
    }
    return best;
}
