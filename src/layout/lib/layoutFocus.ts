// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import { invariant } from "@/util/util";
import debug from "debug";
import { asGroup } from "./layoutNode";
import type { PartitionTree } from "./layoutTree";
import {
    FocusDirection,
    type Dimensions,
    type KeyboardFocusTarget,
    type NodeId,
    type Output,
    type TilingData,
    type WindowGroup,
} from "./types";
import { directionAxis, distance, enteringEdgeMidpoint, isForward, leavingEdgeMidpoint } from "./utils";

const dlog = debug("tiling:focus");

/**
 * Returns true if the group behind a focus target is still part of its tree.
 */
export function isWindowGroupAlive(group: WindowGroup): boolean {
    return group.alive.deref()?.alive ?? false;
}

/**
 * Finds the node that should receive focus when moving from the given leaf in the given direction.
 *
 * The walk goes up through the leaf's ancestors until one of them is laid out along the direction's axis and
 * has a sibling on the requested side, then descends into that sibling until it reaches a leaf.
 * @param tree The tree containing the leaf.
 * @param leafId The leaf focus is moving away from.
 * @param output The output owning the tree, referenced weakly by group targets.
 * @returns The new focus target, or undefined if the leaf is already at the edge in that direction.
 */
export function findFocusTarget(
    tree: PartitionTree<TilingData>,
    leafId: NodeId,
    direction: FocusDirection,
    output: Output
): KeyboardFocusTarget | undefined {
    const origin = tree.data(leafId).lastGeometry;
    let child = leafId;
    let group = tree.parent(child);
    while (group !== undefined) {
        const groupData = asGroup(tree.data(group));

        if (direction === FocusDirection.Out) {
            return {
                type: "group",
                group: {
                    node: group,
                    output: new WeakRef(output),
                    alive: new WeakRef(groupData.alive),
                },
            };
        }

        const siblings = tree.childrenIds(group);
        const idx = siblings.indexOf(child);
        invariant(idx !== -1, `node ${child} missing from group ${group}`);
        if (groupData.orientation === directionAxis(direction)) {
            const neighbor = isForward(direction) ? siblings[idx + 1] : siblings[idx - 1];
            if (neighbor !== undefined) {
                dlog("moving focus from", leafId, "into subtree", neighbor, "of group", group);
                return descend(tree, neighbor, direction, origin);
            }
        }

        child = group;
        group = tree.parent(group);
    }
    return undefined;
}

function descend(
    tree: PartitionTree<TilingData>,
    start: NodeId,
    direction: FocusDirection,
    origin: Dimensions
): KeyboardFocusTarget {
    const axis = directionAxis(direction);
    const center = leavingEdgeMidpoint(origin, direction);
    let nodeId = start;
    for (;;) {
        const data = tree.data(nodeId);
        if (data.kind === "mapped") {
            return { type: "element", element: data.mapped };
        }
        const children = tree.childrenIds(nodeId);
        invariant(children.length > 0, `group ${nodeId} has no children`);
        if (data.orientation === axis) {
            // enter at the near end
            nodeId = isForward(direction) ? children[0] : children[children.length - 1];
            continue;
        }
        let best = children[0];
        let bestDistance = Infinity;
        for (const candidate of children) {
            const d = distance(center, enteringEdgeMidpoint(tree.data(candidate).lastGeometry, direction));
            if (d < bestDistance) {
                best = candidate;
                bestDistance = d;
            }
        }
        nodeId = best;
    }
}
