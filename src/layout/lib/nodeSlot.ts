// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import { globalStore, type JotaiStore } from "@/store/jotaiStore";
import { atom, type Atom, type PrimitiveAtom } from "jotai/vanilla";
import type { NodeId } from "./types";

const writableAtoms = new WeakMap<TilingNodeSlot, PrimitiveAtom<NodeId | null>>();

/**
 * Back-reference from an element to the leaf representing it. Anyone can read or subscribe, only the tiling
 * layout writes (through writeTilingNodeSlot, which the package does not export).
 */
export class TilingNodeSlot {
    readonly atom: Atom<NodeId | null>;
    readonly store: JotaiStore;

    constructor(store: JotaiStore = globalStore) {
        const valueAtom = atom<NodeId | null>(null);
        writableAtoms.set(this, valueAtom);
        this.atom = valueAtom;
        this.store = store;
    }

    get(): NodeId | null {
        return this.store.get(this.atom);
    }

    subscribe(listener: () => void): () => void {
        return this.store.sub(this.atom, listener);
    }
}

export function writeTilingNodeSlot(slot: TilingNodeSlot, value: NodeId | null) {
    const valueAtom = writableAtoms.get(slot);
    if (valueAtom == null) {
        throw new Error("tiling invariant violated: slot has no backing atom");
    }
    slot.store.set(valueAtom, value);
}
