// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import { assert, expect, test } from "vitest";
import { PartitionTree, RemoveBehavior } from "../lib/layoutTree";

test("insert without parent makes the old root a child", () => {
    const tree = new PartitionTree<string>();
    assert(tree.isEmpty(), "new tree should be empty");
    const a = tree.insert("a");
    assert.equal(tree.rootNodeId, a);
    const b = tree.insert("b");
    assert.equal(tree.rootNodeId, b, "b should be the new root");
    assert.equal(tree.parent(a), b, "a should now be a child of b");
    assert.deepEqual(tree.childrenIds(b), [a]);
});

test("insert at index keeps sibling order", () => {
    const tree = new PartitionTree<string>();
    const root = tree.insert("root");
    const a = tree.insert("a", root);
    const c = tree.insert("c", root);
    const b = tree.insert("b", root, 1);
    assert.deepEqual(tree.childrenIds(root), [a, b, c]);
    assert.equal(tree.indexInParent(b), 1);
    assert.equal(tree.indexInParent(root), undefined);
});

test("removed ids are reused", () => {
    const tree = new PartitionTree<string>();
    const root = tree.insert("root");
    const a = tree.insert("a", root);
    const b = tree.insert("b", root);
    assert.equal(tree.remove(a, RemoveBehavior.DropChildren), "a");
    assert.equal(tree.tryData(a), undefined, "a should be gone");
    const c = tree.insert("c", root);
    assert.equal(c, a, "the freed id should be handed out again");
    assert.deepEqual([...tree.traversePreOrderIds()], [root, b, c]);
});

test("remove drops or orphans children", () => {
    const tree = new PartitionTree<string>();
    const root = tree.insert("root");
    const group = tree.insert("group", root);
    const leaf = tree.insert("leaf", group);
    tree.remove(group, RemoveBehavior.DropChildren);
    assert.equal(tree.tryData(leaf), undefined, "children should be dropped with their parent");

    const group2 = tree.insert("group2", root);
    const leaf2 = tree.insert("leaf2", group2);
    tree.remove(group2, RemoveBehavior.OrphanChildren);
    assert.equal(tree.tryData(leaf2), "leaf2", "orphaned child should stay in the arena");
    assert.equal(tree.parent(leaf2), undefined);
    tree.move(leaf2, root, 0);
    assert.deepEqual(tree.childrenIds(root), [leaf2]);
});

test("removing the root empties the tree", () => {
    const tree = new PartitionTree<string>();
    const root = tree.insert("root");
    tree.insert("a", root);
    tree.remove(root, RemoveBehavior.DropChildren);
    assert(tree.isEmpty());
    assert.equal(tree.tryData(root), undefined);
});

test("move to the root demotes the old root", () => {
    const tree = new PartitionTree<string>();
    const root = tree.insert("root");
    const a = tree.insert("a", root);
    tree.move(a);
    assert.equal(tree.rootNodeId, a);
    assert.deepEqual(tree.childrenIds(a), [root]);
    assert.deepEqual(tree.childrenIds(root), []);
});

test("move below a descendant is rejected", () => {
    const tree = new PartitionTree<string>();
    const root = tree.insert("root");
    const a = tree.insert("a", root);
    const b = tree.insert("b", a);
    expect(() => tree.move(a, b)).toThrow("tiling invariant violated: cannot move node 1 below its descendant 2");
});

test("pre-order traversal", () => {
    const tree = new PartitionTree<string>();
    const root = tree.insert("root");
    const a = tree.insert("a", root);
    const a1 = tree.insert("a1", a);
    const a2 = tree.insert("a2", a);
    const b = tree.insert("b", root);
    assert.deepEqual([...tree.traversePreOrderIds()], [root, a, a1, a2, b]);
    assert.deepEqual([...tree.traversePreOrderIds(a)], [a, a1, a2]);
    tree.clear();
    assert.deepEqual([...tree.traversePreOrderIds()], []);
});

test("unknown ids fail loudly", () => {
    const tree = new PartitionTree<string>();
    expect(() => tree.data(7)).toThrow("tiling invariant violated: unknown node id 7");
    assert.equal(tree.tryData(7), undefined);
});
