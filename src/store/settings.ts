// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

/**
 * Settings Atoms
 *
 * Jotai atoms holding the tiling settings. Hosts push new values with `setTilingSettings`, layouts read them
 * through `getSettingsKeyAtom` unless they were given explicit overrides.
 */

import { getEnv } from "@/util/getenv";
import { warn } from "@/util/log";
import { boundNumber } from "@/util/util";
import { atom, type Atom, type PrimitiveAtom } from "jotai/vanilla";
import type { JotaiStore } from "./jotaiStore";

export type TilingSettings = {
    /**
     * Space left between the usable area of an output and the outermost tiles, in logical pixels.
     */
    "tiling:gapouter": number;
    /**
     * Space each tiled window keeps free on every side of its cell, in logical pixels.
     */
    "tiling:gapinner": number;
};

export const DefaultTilingSettings: Readonly<TilingSettings> = {
    "tiling:gapouter": 0,
    "tiling:gapinner": 4,
};

const MaxGapPx = 1000;

export const GapOuterVarName = "TILING_GAP_OUTER";
export const GapInnerVarName = "TILING_GAP_INNER";

const SettingsKeys: readonly (keyof TilingSettings)[] = ["tiling:gapouter", "tiling:gapinner"];

export const settingsAtom: PrimitiveAtom<TilingSettings> = atom<TilingSettings>({ ...DefaultTilingSettings });

const settingsAtomCache = new Map<keyof TilingSettings, Atom<number>>();

export function getSettingsKeyAtom(key: keyof TilingSettings): Atom<number> {
    let settingsKeyAtom = settingsAtomCache.get(key);
    if (settingsKeyAtom == null) {
        settingsKeyAtom = atom((get) => get(settingsAtom)[key]);
        settingsAtomCache.set(key, settingsKeyAtom);
    }
    return settingsKeyAtom;
}

/**
 * Normalizes a gap to a whole number of pixels within [0, MaxGapPx]. Returns null for values that are not numbers.
 */
export function normalizeGap(value: number): number | null {
    const bounded = boundNumber(value, 0, MaxGapPx);
    return bounded == null ? null : Math.round(bounded);
}

export function setTilingSettings(store: JotaiStore, update: Partial<TilingSettings>) {
    const next = { ...store.get(settingsAtom) };
    for (const key of SettingsKeys) {
        const value = update[key];
        if (value === undefined) continue;
        const gap = normalizeGap(value);
        if (gap == null) {
            warn("ignoring invalid tiling setting", key, value);
            continue;
        }
        next[key] = gap;
    }
    store.set(settingsAtom, next);
}

/**
 * Reads gap overrides from the environment. Values that do not parse as numbers are logged and skipped.
 */
export function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<TilingSettings> {
    const settings: Partial<TilingSettings> = {};
    const vars: [keyof TilingSettings, string][] = [
        ["tiling:gapouter", GapOuterVarName],
        ["tiling:gapinner", GapInnerVarName],
    ];
    for (const [key, varName] of vars) {
        const raw = getEnv(varName, env);
        if (raw == null || raw.trim() === "") continue;
        const gap = normalizeGap(Number(raw));
        if (gap == null) {
            warn(`ignoring ${varName}, not a number:`, raw);
            continue;
        }
        settings[key] = gap;
    }
    return settings;
}
