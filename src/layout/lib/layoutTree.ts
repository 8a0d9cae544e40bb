// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import { invariant } from "@/util/util";
import debug from "debug";
import type { NodeId } from "./types";

const dlog = debug("tiling:tree");

type TreeNode<T> = {
    data: T;
    parent?: NodeId;
    children: NodeId[];
};

export enum RemoveBehavior {
    /**
     * Remove the node and its whole subtree.
     */
    DropChildren = "drop",
    /**
     * Remove only the node. Its children stay in the arena without a parent until they are moved.
     */
    OrphanChildren = "orphan",
}

/**
 * Arena-backed ordered tree. Nodes are addressed by ids that stay stable while the node exists and are
 * handed out again after it is removed.
 */
export class PartitionTree<T> {
    private nodes: (TreeNode<T> | undefined)[] = [];
    private freeIds: NodeId[] = [];
    private rootId?: NodeId;

    get rootNodeId(): NodeId | undefined {
        return this.rootId;
    }

    isEmpty(): boolean {
        return this.rootId === undefined;
    }

    tryData(id: NodeId): T | undefined {
        return this.nodes[id]?.data;
    }

    data(id: NodeId): T {
        return this.node(id).data;
    }

    parent(id: NodeId): NodeId | undefined {
        return this.node(id).parent;
    }

    childrenIds(id: NodeId): readonly NodeId[] {
        return this.node(id).children;
    }

    indexInParent(id: NodeId): number | undefined {
        const parent = this.parent(id);
        if (parent === undefined) return;
        const idx = this.node(parent).children.indexOf(id);
        invariant(idx !== -1, `node ${id} missing from children of ${parent}`);
        return idx;
    }

    /**
     * Inserts a node. Without a parent it becomes the root, and a previous root becomes its only child.
     * @param index Position among the parent's children, appended when omitted.
     */
    insert(data: T, parent?: NodeId, index?: number): NodeId {
        const id = this.allocate({ data, children: [] });
        if (parent === undefined) {
            const oldRoot = this.rootId;
            this.rootId = id;
            if (oldRoot !== undefined) {
                this.attach(oldRoot, id);
            }
        } else {
            this.attach(id, parent, index);
        }
        return id;
    }

    /**
     * Removes a node and returns its data.
     */
    remove(id: NodeId, behavior: RemoveBehavior): T {
        const node = this.node(id);
        dlog("remove", id, behavior);
        this.detach(id);
        if (behavior === RemoveBehavior.DropChildren) {
            for (const child of [...node.children]) {
                this.remove(child, RemoveBehavior.DropChildren);
            }
        } else {
            for (const child of node.children) {
                this.node(child).parent = undefined;
            }
        }
        this.nodes[id] = undefined;
        this.freeIds.push(id);
        return node.data;
    }

    /**
     * Moves a node (with its subtree) under a new parent, or to the root when no parent is given. A previous
     * root becomes the child of the moved node.
     */
    move(id: NodeId, parent?: NodeId, index?: number) {
        dlog("move", id, "to", parent ?? "root", index);
        if (parent === undefined) {
            if (this.rootId === id) return;
            this.detach(id);
            const oldRoot = this.rootId;
            this.rootId = id;
            if (oldRoot !== undefined) {
                this.attach(oldRoot, id);
            }
            return;
        }
        invariant(!this.isAncestorOf(id, parent), `cannot move node ${id} below its descendant ${parent}`);
        this.detach(id);
        this.attach(id, parent, index);
    }

    /**
     * Ids of the subtree rooted at the given node (the root by default) in pre-order.
     */
    *traversePreOrderIds(from: NodeId | undefined = this.rootId): Generator<NodeId> {
        if (from === undefined) return;
        const stack: NodeId[] = [from];
        let id = stack.pop();
        while (id !== undefined) {
            yield id;
            const children = this.node(id).children;
            for (let i = children.length - 1; i >= 0; i--) {
                stack.push(children[i]);
            }
            id = stack.pop();
        }
    }

    clear() {
        this.nodes = [];
        this.freeIds = [];
        this.rootId = undefined;
    }

    private node(id: NodeId): TreeNode<T> {
        const node = this.nodes[id];
        invariant(node !== undefined, `unknown node id ${id}`);
        return node;
    }

    private allocate(node: TreeNode<T>): NodeId {
        const id = this.freeIds.pop();
        if (id !== undefined) {
            this.nodes[id] = node;
            return id;
        }
        this.nodes.push(node);
        return this.nodes.length - 1;
    }

    private attach(id: NodeId, parent: NodeId, index?: number) {
        const siblings = this.node(parent).children;
        if (index === undefined || index >= siblings.length) {
            siblings.push(id);
        } else {
            siblings.splice(Math.max(0, index), 0, id);
        }
        this.node(id).parent = parent;
    }

    private detach(id: NodeId) {
        const node = this.node(id);
        if (node.parent !== undefined) {
            const siblings = this.node(node.parent).children;
            siblings.splice(siblings.indexOf(id), 1);
            node.parent = undefined;
        } else if (this.rootId === id) {
            this.rootId = undefined;
        }
    }

    private isAncestorOf(ancestor: NodeId, id: NodeId): boolean {
        let current: NodeId | undefined = id;
        while (current !== undefined) {
            if (current === ancestor) return true;
            current = this.node(current).parent;
        }
        return false;
    }
}
