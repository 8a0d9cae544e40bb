// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import type { Output } from "./types";

/**
 * Raised when an operation references an output the layout has no tree for. Callers can recover by mapping
 * the output first.
 */
export class OutputNotMappedError extends Error {
    override readonly name = "OutputNotMappedError";
    readonly outputName: string;

    constructor(output: Output) {
        super(`output ${output.name} is not mapped`);
        this.outputName = output.name;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, OutputNotMappedError);
        }
    }
}
