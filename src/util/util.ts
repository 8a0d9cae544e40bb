// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

function boundNumber(num: number, min: number, max: number): number | null {
    if (num == null || typeof num != "number" || isNaN(num)) {
        return null;
    }
    return Math.min(Math.max(num, min), max);
}

/**
 * Throws if the condition does not hold. Used for lookups inside trees the layout built itself, where a
 * failure means the structure is corrupt rather than that the caller did something recoverable.
 */
function invariant(condition: unknown, msg: string): asserts condition {
    if (!condition) {
        throw new Error(`tiling invariant violated: ${msg}`);
    }
}

function sum(values: readonly number[]): number {
    return values.reduce((partialSum, v) => partialSum + v, 0);
}

export { boundNumber, invariant, sum };
