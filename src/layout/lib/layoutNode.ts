// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import { invariant, sum } from "@/util/util";
import type { PartitionTree } from "./layoutTree";
import type { Dimensions, GroupData, MappedData, Orientation, TilingData, TilingElement } from "./types";
import { lengthAlong } from "./utils";

/**
 * Witness that a group is still part of its tree. Revoked when the group is removed.
 */
export class LivenessMarker {
    private revoked = false;

    get alive(): boolean {
        return !this.revoked;
    }

    revoke() {
        this.revoked = true;
    }
}

export const PlaceholderGeometry: Readonly<Dimensions> = { left: 0, top: 0, width: 100, height: 100 };

/**
 * Creates the data for a two-child group covering the given geometry, split in equal halves.
 * @param orientation The orientation of the new group.
 * @param geometry The area the group starts out with.
 */
export function newGroupData(orientation: Orientation, geometry: Dimensions = PlaceholderGeometry): GroupData {
    const length = lengthAlong(orientation, geometry);
    const half = Math.floor(length / 2);
    return {
        kind: "group",
        orientation,
        sizes: [half, length - half],
        lastGeometry: { ...geometry },
        alive: new LivenessMarker(),
    };
}

export function newMappedData(mapped: TilingElement, geometry: Dimensions = PlaceholderGeometry): MappedData {
    return { kind: "mapped", mapped, lastGeometry: { ...geometry } };
}

export function isMapped(data: TilingData | undefined, mapped?: TilingElement): data is MappedData {
    return data?.kind === "mapped" && (mapped === undefined || data.mapped === mapped);
}

export function asGroup(data: TilingData): GroupData {
    invariant(data.kind === "group", "expected a group node");
    return data;
}

export function groupLength(group: GroupData): number {
    return lengthAlong(group.orientation, group.lastGeometry);
}

/**
 * Pushes whatever is left between the sizes and the target length onto the last entry. An excess is taken
 * back from the end, never leaving an entry below zero.
 */
function absorbDrift(sizes: number[], length: number) {
    if (sizes.length === 0) return;
    let drift = length - sum(sizes);
    if (drift > 0) {
        sizes[sizes.length - 1] += drift;
        return;
    }
    for (let i = sizes.length - 1; i >= 0 && drift < 0; i--) {
        const taken = Math.min(sizes[i], -drift);
        sizes[i] -= taken;
        drift += taken;
    }
}

/**
 * Scales sizes from one length to another, keeping their proportions. Falls back to an equal split when the
 * previous length is unknown.
 */
export function rescaleSizes(sizes: readonly number[], previousLength: number, newLength: number): number[] {
    if (sizes.length === 0) return [];
    let rescaled: number[];
    if (previousLength <= 0) {
        const share = Math.floor(newLength / sizes.length);
        rescaled = sizes.map(() => share);
    } else {
        rescaled = sizes.map((size) => Math.round((size / previousLength) * newLength));
    }
    absorbDrift(rescaled, newLength);
    return rescaled;
}

/**
 * Makes room for a new child at the given index. The new child gets an equal share and the others shrink
 * proportionally, so the sizes keep summing to the group length.
 */
export function addWindow(group: GroupData, idx: number) {
    const length = groupLength(group);
    const equalSizing = Math.floor(length / (group.sizes.length + 1));
    const remainder = length - equalSizing;
    const sizes =
        length > 0 ? group.sizes.map((size) => Math.round((size / length) * remainder)) : group.sizes.map(() => 0);
    sizes.splice(idx, 0, 0);
    sizes[idx] = Math.max(0, length - sum(sizes));
    absorbDrift(sizes, length);
    group.sizes = sizes;
}

/**
 * Drops the size of the child at the given index and hands its space to the remaining children according
 * to their current weight.
 */
export function removeWindow(group: GroupData, idx: number) {
    invariant(idx >= 0 && idx < group.sizes.length, `no size entry at ${idx}`);
    const length = groupLength(group);
    const sizes = [...group.sizes];
    const [oldSize] = sizes.splice(idx, 1);
    const remaining = length - oldSize;
    for (let i = 0; i < sizes.length; i++) {
        const share = remaining > 0 ? sizes[i] / remaining : 1 / sizes.length;
        sizes[i] += Math.round(oldSize * share);
    }
    absorbDrift(sizes, length);
    group.sizes = sizes;
}

/**
 * Records a newly assigned geometry. Groups rescale their sizes from the old length to the new one.
 */
export function updateGeometry(data: TilingData, geometry: Dimensions) {
    if (data.kind === "group") {
        data.sizes = rescaleSizes(data.sizes, groupLength(data), lengthAlong(data.orientation, geometry));
    }
    data.lastGeometry = { ...geometry };
}

/**
 * Changes the orientation of a group, rescaling its sizes to the length of the other axis.
 */
export function setOrientation(group: GroupData, orientation: Orientation) {
    const previousLength = groupLength(group);
    const newLength = lengthAlong(orientation, group.lastGeometry);
    group.sizes = rescaleSizes(group.sizes, previousLength, newLength);
    group.orientation = orientation;
}

/**
 * Copies node data for another tree. Groups get a fresh liveness marker.
 */
export function cloneData(data: TilingData): TilingData {
    if (data.kind === "group") {
        return { ...data, sizes: [...data.sizes], lastGeometry: { ...data.lastGeometry }, alive: new LivenessMarker() };
    }
    return { ...data, lastGeometry: { ...data.lastGeometry } };
}

/**
 * Checks the structural invariants of a tree.
 * @param checkSizes Whether group sizes must add up to the group length, which only holds after geometry has
 * been propagated.
 * @returns A description of every violation found, empty if the tree is valid.
 */
export function validateTree(tree: PartitionTree<TilingData>, checkSizes = true): string[] {
    const problems: string[] = [];
    const root = tree.rootNodeId;
    if (root === undefined) return problems;
    if (tree.parent(root) !== undefined) {
        problems.push(`root ${root} has a parent`);
    }
    const seen = new Set<TilingElement>();
    for (const id of tree.traversePreOrderIds(root)) {
        const data = tree.data(id);
        const children = tree.childrenIds(id);
        if (data.kind === "mapped") {
            if (children.length > 0) {
                problems.push(`leaf ${id} has children`);
            }
            if (seen.has(data.mapped)) {
                problems.push(`element of leaf ${id} appears more than once`);
            }
            seen.add(data.mapped);
            if (data.mapped.tilingNodeId.get() !== id) {
                problems.push(`element of leaf ${id} points at ${data.mapped.tilingNodeId.get()}`);
            }
            continue;
        }
        if (children.length < 2) {
            problems.push(`group ${id} has ${children.length} children`);
        }
        if (data.sizes.length !== children.length) {
            problems.push(`group ${id} has ${data.sizes.length} sizes for ${children.length} children`);
        }
        if (checkSizes && sum(data.sizes) !== groupLength(data)) {
            problems.push(`group ${id} sizes add up to ${sum(data.sizes)}, expected ${groupLength(data)}`);
        }
    }
    return problems;
}
