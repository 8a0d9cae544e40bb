// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import { assert, test } from "vitest";
import {
    addWindow,
    asGroup,
    cloneData,
    newGroupData,
    newMappedData,
    removeWindow,
    rescaleSizes,
    setOrientation,
    updateGeometry,
    validateTree,
} from "../lib/layoutNode";
import { PartitionTree } from "../lib/layoutTree";
import { writeTilingNodeSlot } from "../lib/nodeSlot";
import { Orientation, type TilingData } from "../lib/types";
import { FakeElement, newTestStore } from "./model";

const wide = { left: 0, top: 0, width: 1000, height: 500 };

test("new groups split their length in halves", () => {
    assert.deepEqual(newGroupData(Orientation.Vertical, wide).sizes, [500, 500]);
    assert.deepEqual(newGroupData(Orientation.Horizontal, { left: 0, top: 0, width: 101, height: 51 }).sizes, [25, 26]);
});

test("addWindow gives the new child an equal share", () => {
    const group = newGroupData(Orientation.Vertical, wide);
    addWindow(group, 2);
    assert.deepEqual(group.sizes, [334, 334, 332]);

    const uneven = newGroupData(Orientation.Vertical, wide);
    uneven.sizes = [600, 400];
    addWindow(uneven, 1);
    assert.deepEqual(uneven.sizes, [400, 333, 267]);
});

test("removeWindow hands the space back by weight", () => {
    const group = newGroupData(Orientation.Vertical, wide);
    group.sizes = [400, 333, 267];
    removeWindow(group, 1);
    assert.deepEqual(group.sizes, [600, 400]);

    const even = newGroupData(Orientation.Vertical, wide);
    even.sizes = [334, 334, 332];
    removeWindow(even, 2);
    assert.deepEqual(even.sizes, [500, 500]);
});

test("rescaleSizes keeps the exact sum", () => {
    assert.deepEqual(rescaleSizes([500, 500], 1000, 801), [401, 400]);
    assert.deepEqual(rescaleSizes([3, 3, 3], 0, 10), [3, 3, 4]);
    assert.deepEqual(rescaleSizes([], 10, 20), []);
});

test("rescaleSizes never goes below zero when shrinking", () => {
    assert.deepEqual(rescaleSizes([2, 2, 2, 2], 8, 2), [1, 1, 0, 0]);
    assert.deepEqual(rescaleSizes([1, 1, 1], 3, 0), [0, 0, 0]);
});

test("updateGeometry rescales group sizes", () => {
    const group = newGroupData(Orientation.Vertical, wide);
    group.sizes = [600, 400];
    updateGeometry(group, { left: 10, top: 10, width: 500, height: 500 });
    assert.deepEqual(group.sizes, [300, 200]);
    assert.deepEqual(group.lastGeometry, { left: 10, top: 10, width: 500, height: 500 });
});

test("setOrientation rescales to the other axis", () => {
    const group = newGroupData(Orientation.Vertical, wide);
    group.sizes = [600, 400];
    setOrientation(group, Orientation.Horizontal);
    assert.equal(group.orientation, Orientation.Horizontal);
    assert.deepEqual(group.sizes, [300, 200]);
});

test("cloneData gives groups a fresh liveness marker", () => {
    const group = newGroupData(Orientation.Vertical, wide);
    const copy = asGroup(cloneData(group));
    assert.notStrictEqual(copy.alive, group.alive);
    group.alive.revoke();
    assert(copy.alive.alive, "the copy should stay alive");
    copy.sizes[0] = 1;
    assert.equal(group.sizes[0], 500, "sizes should not be shared");
});

test("validateTree reports broken invariants", () => {
    const store = newTestStore();
    const a = new FakeElement("a", store);
    const b = new FakeElement("b", store);
    const tree = new PartitionTree<TilingData>();
    const root = tree.insert(newGroupData(Orientation.Vertical, wide));
    const leafA = tree.insert(newMappedData(a), root);
    const leafB = tree.insert(newMappedData(b), root);
    writeTilingNodeSlot(a.tilingNodeId, leafA);
    writeTilingNodeSlot(b.tilingNodeId, leafB);
    assert.deepEqual(validateTree(tree), []);

    const group = asGroup(tree.data(root));
    group.sizes = [500, 400];
    assert.deepEqual(validateTree(tree), ["group 0 sizes add up to 900, expected 1000"]);
    assert.deepEqual(validateTree(tree, false), []);

    writeTilingNodeSlot(b.tilingNodeId, 5);
    assert.deepEqual(validateTree(tree, false), ["element of leaf 2 points at 5"]);
});
