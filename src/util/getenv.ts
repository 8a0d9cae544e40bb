// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

/**
 * Gets an environment variable from the host process.
 * @param paramName The name of the environment variable to attempt to retrieve.
 * @returns The value of the environment variable or null if not present.
 */
export function getEnv(paramName: string, env: NodeJS.ProcessEnv = process.env): string | null {
    return env[paramName] ?? null;
}
