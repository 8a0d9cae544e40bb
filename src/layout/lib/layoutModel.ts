// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import { globalStore, type JotaiStore } from "@/store/jotaiStore";
import { getSettingsKeyAtom, normalizeGap } from "@/store/settings";
import { log, warn } from "@/util/log";
import { invariant } from "@/util/util";
import debug from "debug";
import { atom, type Atom } from "jotai/vanilla";
import { OutputNotMappedError } from "./errors";
import { findFocusTarget } from "./layoutFocus";
import {
    addWindow,
    asGroup,
    cloneData,
    isMapped,
    LivenessMarker,
    newGroupData,
    newMappedData,
    removeWindow,
    setOrientation,
    updateGeometry,
    validateTree,
} from "./layoutNode";
import { PartitionTree, RemoveBehavior } from "./layoutTree";
import { writeTilingNodeSlot } from "./nodeSlot";
import type {
    Dimensions,
    FocusDirection,
    Gaps,
    KeyboardFocusTarget,
    MappedEntry,
    NodeId,
    Orientation,
    Output,
    Point,
    RenderElement,
    Seat,
    TilingData,
    TilingElement,
    WindowEntry,
} from "./types";
import {
    addPoints,
    dimensionsEqual,
    orientationForArea,
    scalePoint,
    shrinkDimensions,
    sliceDimensions,
    translateDimensions,
} from "./utils";

const dlog = debug("tiling:layout");

type OutputData = {
    output: Output;
    /**
     * Placement of the output in the global coordinate space.
     */
    location: Point;
    tree: PartitionTree<TilingData>;
    /**
     * Set by structural changes so the next refresh lays the tree out even if its root area is unchanged.
     */
    dirty: boolean;
};

type ActiveWindow = {
    element: TilingElement;
    nodeId: NodeId;
};

/**
 * Picks the output that receives the windows of an output being unmapped.
 * @param remaining The outputs still registered, in registration order.
 * @param unmapped The output going away.
 */
export type UnmapOutputTarget = (remaining: readonly Output[], unmapped: Output) => Output | undefined;

export const firstRemainingOutput: UnmapOutputTarget = (remaining) => remaining[0];

export interface TilingLayoutOptions {
    /**
     * Store the gap settings are read from. Defaults to the global store.
     */
    store?: JotaiStore;
    /**
     * Gaps for this layout only. Unset gaps follow the tiling settings.
     */
    gaps?: Partial<Gaps>;
    unmapOutputTarget?: UnmapOutputTarget;
}

/**
 * Tiles elements on every mapped output. Each output owns a partition tree whose leaves are elements and
 * whose inner nodes split their area among their children along one axis.
 */
export class TilingLayout {
    /**
     * The jotai store used to read the gap settings.
     */
    readonly store: JotaiStore;
    /**
     * Space between an output's usable area and the outermost tiles.
     */
    outerGap: Atom<number>;
    /**
     * Space left around each tiled element inside its cell.
     */
    innerGap: Atom<number>;
    /**
     * Trees by output, in registration order.
     */
    private trees: Map<Output, OutputData>;
    private unmapOutputTarget: UnmapOutputTarget;

    constructor(options: TilingLayoutOptions = {}) {
        this.store = options.store ?? globalStore;
        this.outerGap = gapAtom(options.gaps?.outer, getSettingsKeyAtom("tiling:gapouter"));
        this.innerGap = gapAtom(options.gaps?.inner, getSettingsKeyAtom("tiling:gapinner"));
        this.unmapOutputTarget = options.unmapOutputTarget ?? firstRemainingOutput;
        this.trees = new Map();
    }

    /**
     * Registers an output, or updates its placement. The output's tree is left untouched.
     * @param output The output to register.
     * @param location The placement of the output in global coordinates.
     */
    mapOutput(output: Output, location: Point) {
        const entry = this.trees.get(output);
        if (entry) {
            entry.location = { ...location };
            return;
        }
        dlog("mapping output", output.name, location);
        this.trees.set(output, { output, location: { ...location }, tree: new PartitionTree(), dirty: false });
    }

    /**
     * Removes an output and moves its elements onto the output chosen by the unmapOutputTarget option. Without
     * a remaining output the elements are released and no longer tiled.
     */
    unmapOutput(output: Output) {
        const src = this.trees.get(output);
        if (!src) return;
        this.trees.delete(output);

        const target = this.unmapOutputTarget([...this.trees.keys()], output);
        const dst = target ? this.trees.get(target) : undefined;
        if (!dst) {
            if (!src.tree.isEmpty()) {
                warn(`output ${output.name} unmapped with no output to take its windows, releasing them`);
            }
            releaseTree(src.tree);
            return;
        }
        log(`moving windows of unmapped output ${output.name} to ${dst.output.name}`);
        mergeTrees(src.tree, dst, orientationForArea(dst.output.geometry()));
        this.refresh();
    }

    outputs(): Output[] {
        return [...this.trees.keys()];
    }

    /**
     * Returns the tree of an output, or undefined if the output is not mapped.
     */
    getTree(output: Output): PartitionTree<TilingData> | undefined {
        return this.trees.get(output)?.tree;
    }

    /**
     * Tiles a new element on the seat's active output next to the most recently focused element.
     * @param element The element to tile.
     * @param seat The seat whose active output receives the element.
     * @param focusStack Elements ordered from most to least recently focused.
     */
    map(element: TilingElement, seat: Seat, focusStack: Iterable<TilingElement>) {
        const entry = this.outputData(seat.activeOutput());
        if (this.findLeaf(element)) {
            warn("element is already tiled, not mapping it again");
            return;
        }
        this.mapInternal(element, entry, lastActiveWindow(entry.tree, focusStack));
        this.refresh();
    }

    /**
     * Tiles a new element right after the most recently focused element inside that element's group, instead
     * of splitting the focused element. Behaves like map when the focused element is not inside a group.
     */
    mapBeside(element: TilingElement, seat: Seat, focusStack: Iterable<TilingElement>) {
        const entry = this.outputData(seat.activeOutput());
        if (this.findLeaf(element)) {
            warn("element is already tiled, not mapping it again");
            return;
        }
        const lastActive = lastActiveWindow(entry.tree, focusStack);
        const parent = lastActive ? entry.tree.parent(lastActive.nodeId) : undefined;
        if (!lastActive || parent === undefined) {
            this.mapInternal(element, entry, lastActive);
        } else {
            const idx = (entry.tree.indexInParent(lastActive.nodeId) ?? 0) + 1;
            addWindow(asGroup(entry.tree.data(parent)), idx);
            const nodeId = entry.tree.insert(newMappedData(element), parent, idx);
            writeTilingNodeSlot(element.tilingNodeId, nodeId);
            entry.dirty = true;
            dlog("appended element as node", nodeId, "to group", parent, "at", idx);
        }
        this.refresh();
    }

    private mapInternal(element: TilingElement, entry: OutputData, lastActive: ActiveWindow | undefined) {
        const tree = entry.tree;
        const newWindow = newMappedData(element);
        let windowId: NodeId;
        if (lastActive) {
            const orientation = orientationForArea(tree.data(lastActive.nodeId).lastGeometry);
            windowId = newGroup(tree, lastActive.nodeId, newWindow, orientation);
        } else {
            // nothing focused here, split the whole tree
            const root = tree.rootNodeId;
            if (root !== undefined) {
                windowId = newGroup(tree, root, newWindow, orientationForArea(entry.output.geometry()));
            } else {
                windowId = tree.insert(newWindow);
            }
        }
        writeTilingNodeSlot(element.tilingNodeId, windowId);
        entry.dirty = true;
        dlog("mapped element as node", windowId, "on", entry.output.name);
    }

    /**
     * Removes an element from the layout.
     * @returns True if the element was tiled.
     */
    unmap(element: TilingElement): boolean {
        if (this.unmapWindowInternal(element)) {
            element.setTiled(false);
            this.refresh();
            return true;
        }
        return false;
    }

    private unmapWindowInternal(element: TilingElement): boolean {
        const found = this.findLeaf(element);
        if (!found) return false;
        const { entry, nodeId } = found;
        const tree = entry.tree;

        const parentId = tree.parent(nodeId);
        const position = tree.indexInParent(nodeId);
        const grandparentId = parentId !== undefined ? tree.parent(parentId) : undefined;

        dlog("removing node", nodeId, "from", entry.output.name);
        tree.remove(nodeId, RemoveBehavior.DropChildren);
        writeTilingNodeSlot(element.tilingNodeId, null);
        entry.dirty = true;

        if (parentId === undefined) {
            // was the root
            return true;
        }
        invariant(position !== undefined, `node ${nodeId} had a parent but no position`);
        const group = asGroup(tree.data(parentId));
        if (group.sizes.length > 2) {
            removeWindow(group, position);
            return true;
        }

        dlog("collapsing group", parentId);
        const [survivor] = tree.childrenIds(parentId);
        invariant(survivor !== undefined, `group ${parentId} lost all of its children`);
        const forkPosition = tree.indexInParent(parentId);
        group.alive.revoke();
        tree.remove(parentId, RemoveBehavior.OrphanChildren);
        tree.move(survivor, grandparentId, forkPosition);
        return true;
    }

    /**
     * Returns the output whose tree holds the element.
     */
    outputForElement(element: TilingElement): Output | undefined {
        return this.findLeaf(element)?.entry.output;
    }

    /**
     * Returns the area of a tiled element in global coordinates.
     */
    elementGeometry(element: TilingElement): Dimensions | undefined {
        const found = this.findLeaf(element);
        if (!found) return;
        const { entry, nodeId } = found;
        return translateDimensions(this.windowArea(entry.tree.data(nodeId).lastGeometry), entry.location);
    }

    /**
     * Finds what should be focused when moving focus from the most recently focused element of the seat's
     * active output.
     * @returns The element or group to focus, or undefined if there is nothing in that direction or the
     * focused element handled the move itself.
     */
    nextFocus(
        direction: FocusDirection,
        seat: Seat,
        focusStack: Iterable<TilingElement>
    ): KeyboardFocusTarget | undefined {
        const output = seat.activeOutput();
        const entry = this.outputData(output);
        const lastActive = lastActiveWindow(entry.tree, focusStack);
        if (!lastActive) return;

        // stacks may handle focus internally
        if (lastActive.element.handleFocus(direction)) {
            return;
        }
        return findFocusTarget(entry.tree, lastActive.nodeId, direction, output);
    }

    /**
     * Changes the orientation of the group holding the most recently focused element.
     */
    updateOrientation(orientation: Orientation, seat: Seat, focusStack: Iterable<TilingElement>) {
        const entry = this.outputData(seat.activeOutput());
        const lastActive = lastActiveWindow(entry.tree, focusStack);
        const parent = lastActive ? entry.tree.parent(lastActive.nodeId) : undefined;
        if (parent !== undefined) {
            const group = asGroup(entry.tree.data(parent));
            if (group.orientation !== orientation) {
                setOrientation(group, orientation);
                entry.dirty = true;
            }
        }
        this.refresh();
    }

    /**
     * Drops elements that are no longer alive and lays out every tree whose area or structure changed.
     */
    refresh() {
        const deadWindows = [...this.mapped()].map(({ element }) => element).filter((element) => !element.alive());
        for (const deadWindow of deadWindows) {
            this.unmapWindowInternal(deadWindow);
        }
        this.updateSpacePositions();
    }

    private updateSpacePositions() {
        const outer = this.store.get(this.outerGap);
        const inner = this.store.get(this.innerGap);
        for (const entry of this.trees.values()) {
            const tree = entry.tree;
            const root = tree.rootNodeId;
            if (root === undefined) {
                entry.dirty = false;
                continue;
            }
            const geometry = shrinkDimensions(entry.output.nonExclusiveZone(), outer);
            if (!entry.dirty && dimensionsEqual(tree.data(root).lastGeometry, geometry)) {
                continue;
            }

            const queue: [NodeId, Dimensions][] = [[root, geometry]];
            for (let i = 0; i < queue.length; i++) {
                const [nodeId, geo] = queue[i];
                const data = tree.data(nodeId);
                updateGeometry(data, geo);
                if (data.kind === "group") {
                    const slices = sliceDimensions(geo, data.orientation, data.sizes);
                    tree.childrenIds(nodeId).forEach((child, idx) => queue.push([child, slices[idx]]));
                } else if (!data.mapped.isFullscreen()) {
                    data.mapped.setTiled(true);
                    data.mapped.setSize({
                        width: Math.max(0, geo.width - inner * 2),
                        height: Math.max(0, geo.height - inner * 2),
                    });
                    data.mapped.configure();
                }
            }
            entry.dirty = false;

            if (dlog.enabled) {
                const problems = validateTree(tree);
                if (problems.length > 0) {
                    dlog("tree of", entry.output.name, "is inconsistent:", problems);
                }
            }
        }
    }

    /**
     * Yields every tiled element with its output and global location.
     */
    *mapped(): Generator<MappedEntry> {
        for (const entry of this.trees.values()) {
            for (const nodeId of entry.tree.traversePreOrderIds()) {
                const data = entry.tree.data(nodeId);
                if (data.kind !== "mapped") continue;
                const area = this.windowArea(data.lastGeometry);
                yield {
                    output: entry.output,
                    element: data.mapped,
                    location: addPoints(entry.location, { x: area.left, y: area.top }),
                };
            }
        }
    }

    /**
     * Yields every surface of every tiled element with its global location.
     */
    *windows(): Generator<WindowEntry> {
        for (const { output, element, location } of this.mapped()) {
            for (const { surface, offset } of element.windows()) {
                yield { output, surface, location: addPoints(location, offset) };
            }
        }
    }

    /**
     * Moves every tree of another layout into this one. Trees of outputs this layout does not know yet are
     * registered with the other layout's placement. The other layout is left empty.
     */
    merge(other: TilingLayout) {
        for (const [output, src] of other.trees) {
            let dst = this.trees.get(output);
            if (!dst) {
                dst = { output, location: { ...src.location }, tree: new PartitionTree(), dirty: false };
                this.trees.set(output, dst);
            }
            mergeTrees(src.tree, dst, orientationForArea(output.geometry()));
        }
        other.trees = new Map();
        this.refresh();
    }

    /**
     * Collects the render elements of the elements on an output, in physical coordinates.
     * @throws OutputNotMappedError if the output has no tree.
     */
    renderOutput(output: Output): RenderElement[] {
        if (!this.trees.has(output)) {
            throw new OutputNotMappedError(output);
        }
        const scale = output.currentScale();
        const elements: RenderElement[] = [];
        for (const { output: o, element, location } of this.mapped()) {
            if (o !== output) continue;
            elements.push(...element.renderElements(scalePoint(location, scale.integer), scale.fractional));
        }
        return elements;
    }

    /**
     * Checks the invariants of every tree, plus that no element is tiled twice across outputs.
     * @returns A description of every problem found.
     */
    validate(): string[] {
        const problems: string[] = [];
        const seen = new Set<TilingElement>();
        for (const entry of this.trees.values()) {
            problems.push(...validateTree(entry.tree).map((problem) => `${entry.output.name}: ${problem}`));
            for (const nodeId of entry.tree.traversePreOrderIds()) {
                const data = entry.tree.data(nodeId);
                if (data.kind !== "mapped") continue;
                if (seen.has(data.mapped)) {
                    problems.push(`${entry.output.name}: element of leaf ${nodeId} is tiled on another output`);
                }
                seen.add(data.mapped);
            }
        }
        return problems;
    }

    private outputData(output: Output): OutputData {
        const entry = this.trees.get(output);
        if (!entry) {
            throw new OutputNotMappedError(output);
        }
        return entry;
    }

    private findLeaf(element: TilingElement): { entry: OutputData; nodeId: NodeId } | undefined {
        const nodeId = element.tilingNodeId.get();
        if (nodeId == null) return;
        for (const entry of this.trees.values()) {
            if (isMapped(entry.tree.tryData(nodeId), element)) {
                return { entry, nodeId };
            }
        }
        return;
    }

    private windowArea(cell: Dimensions): Dimensions {
        return shrinkDimensions(cell, this.store.get(this.innerGap));
    }
}

function gapAtom(override: number | undefined, setting: Atom<number>): Atom<number> {
    if (override === undefined) {
        return setting;
    }
    const gap = normalizeGap(override);
    if (gap == null) {
        warn("ignoring invalid gap override", override);
        return setting;
    }
    return atom(gap);
}

/**
 * Finds the most recently focused element of the stack that is tiled in this tree.
 */
function lastActiveWindow(
    tree: PartitionTree<TilingData>,
    focusStack: Iterable<TilingElement>
): ActiveWindow | undefined {
    for (const element of focusStack) {
        const nodeId = element.tilingNodeId.get();
        if (nodeId != null && isMapped(tree.tryData(nodeId), element)) {
            return { element, nodeId };
        }
    }
    return;
}

/**
 * Replaces a node with a new two-child group holding the node and a new node, keeping the position of the
 * replaced node among its siblings.
 * @returns The id of the new node.
 */
function newGroup(
    tree: PartitionTree<TilingData>,
    oldId: NodeId,
    newData: TilingData,
    orientation: Orientation
): NodeId {
    const parentId = tree.parent(oldId);
    const position = tree.indexInParent(oldId);
    const groupId = tree.insert(newGroupData(orientation, tree.data(oldId).lastGeometry), parentId, position);
    tree.move(oldId, groupId);
    return tree.insert(newData, groupId);
}

/**
 * Moves the contents of one tree into an output's tree. An empty destination adopts the source nodes, with fresh
 * group markers.
 * Otherwise the source is copied node by node next to the destination's root, inside a new group with the
 * given orientation, and the copied elements are pointed at their new nodes.
 */
function mergeTrees(src: PartitionTree<TilingData>, dst: OutputData, orientation: Orientation) {
    const srcRoot = src.rootNodeId;
    if (srcRoot === undefined) return;
    dst.dirty = true;
    const dstRoot = dst.tree.rootNodeId;
    if (dstRoot === undefined) {
        // groups handed out as focus targets belonged to the old output
        for (const nodeId of src.traversePreOrderIds()) {
            const data = src.data(nodeId);
            if (data.kind === "group") {
                data.alive.revoke();
                data.alive = new LivenessMarker();
            }
        }
        dst.tree = src;
        return;
    }

    const copyRoot = newGroup(dst.tree, dstRoot, cloneData(src.data(srcRoot)), orientation);
    const stack: [NodeId, NodeId][] = [[srcRoot, copyRoot]];
    let next = stack.pop();
    while (next !== undefined) {
        const [srcId, dstId] = next;
        relinkCopiedNode(src.data(srcId), dst.tree.data(dstId), dstId);
        for (const childId of src.childrenIds(srcId)) {
            const newChildId = dst.tree.insert(cloneData(src.data(childId)), dstId);
            stack.push([childId, newChildId]);
        }
        next = stack.pop();
    }
    src.clear();
}

function relinkCopiedNode(original: TilingData, copy: TilingData, copyId: NodeId) {
    if (original.kind === "group") {
        original.alive.revoke();
    } else if (copy.kind === "mapped") {
        writeTilingNodeSlot(copy.mapped.tilingNodeId, copyId);
    }
}

/**
 * Untiles every element of a tree and empties it.
 */
function releaseTree(tree: PartitionTree<TilingData>) {
    for (const nodeId of tree.traversePreOrderIds()) {
        const data = tree.data(nodeId);
        if (data.kind === "group") {
            data.alive.revoke();
        } else {
            writeTilingNodeSlot(data.mapped.tilingNodeId, null);
            data.mapped.setTiled(false);
        }
    }
    tree.clear();
}
