// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import type { LivenessMarker } from "./layoutNode";
import type { TilingNodeSlot } from "./nodeSlot";

export enum FocusDirection {
    Left = 0,
    Right = 1,
    Up = 2,
    Down = 3,
    Out = 4,
}

/**
 * The axis along which a group lays out its children.
 */
export enum Orientation {
    /**
     * Children are stacked top to bottom, sizes are heights.
     */
    Horizontal = "horizontal",
    /**
     * Children sit side by side, sizes are widths.
     */
    Vertical = "vertical",
}

export type Point = {
    x: number;
    y: number;
};

export type Size = {
    width: number;
    height: number;
};

export type Dimensions = {
    left: number;
    top: number;
    width: number;
    height: number;
};

/**
 * Identifier of a node inside a PartitionTree. Ids are reused once a node is removed.
 */
export type NodeId = number;

export type OutputScale = {
    fractional: number;
    integer: number;
};

/**
 * A display output as seen by the layout. Identity is object identity.
 */
export interface Output {
    readonly name: string;
    /**
     * Logical geometry of the output.
     */
    geometry(): Dimensions;
    currentScale(): OutputScale;
    /**
     * The output area minus the space reserved by panels and docks, relative to the output's origin.
     */
    nonExclusiveZone(): Dimensions;
}

export interface Seat {
    activeOutput(): Output;
}

/**
 * A surface making up part of a tiled element, e.g. one window of a stack.
 */
export interface Surface {
    readonly id: string;
}

export type SurfaceEntry = {
    surface: Surface;
    /**
     * Offset of the surface relative to the element's location.
     */
    offset: Point;
};

export type RenderElement = {
    surface: Surface;
    /**
     * Location in physical pixels.
     */
    location: Point;
    scale: number;
};

/**
 * A window (or group of windows) that can be tiled. Implemented by the host.
 */
export interface TilingElement {
    /**
     * The leaf currently representing this element, written only by the tiling layout.
     */
    readonly tilingNodeId: TilingNodeSlot;
    alive(): boolean;
    isFullscreen(): boolean;
    /**
     * Returns true if the element moved focus among its own parts and the layout should do nothing.
     */
    handleFocus(direction: FocusDirection): boolean;
    setTiled(tiled: boolean): void;
    setSize(size: Size): void;
    configure(): void;
    windows(): Iterable<SurfaceEntry>;
    renderElements(location: Point, scale: number): RenderElement[];
}

export type GroupData = {
    kind: "group";
    orientation: Orientation;
    /**
     * One entry per child, in child order. Sums to the length of lastGeometry along orientation.
     */
    sizes: number[];
    lastGeometry: Dimensions;
    alive: LivenessMarker;
};

export type MappedData = {
    kind: "mapped";
    mapped: TilingElement;
    lastGeometry: Dimensions;
};

export type TilingData = GroupData | MappedData;

/**
 * Weak handle to a group, handed out by focus navigation. Check isWindowGroupAlive before using node.
 */
export type WindowGroup = {
    node: NodeId;
    output: WeakRef<Output>;
    alive: WeakRef<LivenessMarker>;
};

export type KeyboardFocusTarget = { type: "element"; element: TilingElement } | { type: "group"; group: WindowGroup };

export type MappedEntry = {
    output: Output;
    element: TilingElement;
    /**
     * Global location of the element.
     */
    location: Point;
};

export type WindowEntry = {
    output: Output;
    surface: Surface;
    location: Point;
};

export type Gaps = {
    outer: number;
    inner: number;
};
