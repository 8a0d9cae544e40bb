// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import { FocusDirection, Orientation, type Dimensions, type Point } from "./types";

/**
 * Length of a rectangle along the axis a group with the given orientation divides.
 */
export function lengthAlong(orientation: Orientation, dimensions: Dimensions): number {
    return orientation === Orientation.Horizontal ? dimensions.height : dimensions.width;
}

/**
 * Split wide areas side by side and tall (or square) areas top to bottom.
 */
export function orientationForArea({ width, height }: Dimensions): Orientation {
    return width > height ? Orientation.Vertical : Orientation.Horizontal;
}

export function shrinkDimensions({ left, top, width, height }: Dimensions, amount: number): Dimensions {
    return {
        left: left + amount,
        top: top + amount,
        width: Math.max(0, width - amount * 2),
        height: Math.max(0, height - amount * 2),
    };
}

export function translateDimensions(dimensions: Dimensions, offset: Point): Dimensions {
    return { ...dimensions, left: dimensions.left + offset.x, top: dimensions.top + offset.y };
}

export function dimensionsEqual(a: Dimensions, b: Dimensions): boolean {
    return a.left === b.left && a.top === b.top && a.width === b.width && a.height === b.height;
}

export function addPoints(a: Point, b: Point): Point {
    return { x: a.x + b.x, y: a.y + b.y };
}

export function scalePoint({ x, y }: Point, scale: number): Point {
    return { x: x * scale, y: y * scale };
}

/**
 * Splits a rectangle into consecutive slices along the group axis, one per size.
 */
export function sliceDimensions(dimensions: Dimensions, orientation: Orientation, sizes: readonly number[]): Dimensions[] {
    let previous = 0;
    return sizes.map((size) => {
        const slice: Dimensions =
            orientation === Orientation.Horizontal
                ? { left: dimensions.left, top: dimensions.top + previous, width: dimensions.width, height: size }
                : { left: dimensions.left + previous, top: dimensions.top, width: size, height: dimensions.height };
        previous += size;
        return slice;
    });
}

export function directionAxis(direction: FocusDirection): Orientation | undefined {
    switch (direction) {
        case FocusDirection.Up:
        case FocusDirection.Down:
            return Orientation.Horizontal;
        case FocusDirection.Left:
        case FocusDirection.Right:
            return Orientation.Vertical;
        default:
            return undefined;
    }
}

export function isForward(direction: FocusDirection): boolean {
    return direction === FocusDirection.Down || direction === FocusDirection.Right;
}

/**
 * Midpoint of the edge a focus move in the given direction leaves through.
 */
export function leavingEdgeMidpoint(dimensions: Dimensions, direction: FocusDirection): Point {
    const { left, top, width, height } = dimensions;
    switch (direction) {
        case FocusDirection.Up:
            return { x: left + width / 2, y: top };
        case FocusDirection.Down:
            return { x: left + width / 2, y: top + height };
        case FocusDirection.Left:
            return { x: left, y: top + height / 2 };
        case FocusDirection.Right:
            return { x: left + width, y: top + height / 2 };
        default:
            throw new Error(`no edge for direction ${FocusDirection[direction]}`);
    }
}

/**
 * Midpoint of the edge a focus move in the given direction enters through.
 */
export function enteringEdgeMidpoint(dimensions: Dimensions, direction: FocusDirection): Point {
    switch (direction) {
        case FocusDirection.Up:
            return leavingEdgeMidpoint(dimensions, FocusDirection.Down);
        case FocusDirection.Down:
            return leavingEdgeMidpoint(dimensions, FocusDirection.Up);
        case FocusDirection.Left:
            return leavingEdgeMidpoint(dimensions, FocusDirection.Right);
        case FocusDirection.Right:
            return leavingEdgeMidpoint(dimensions, FocusDirection.Left);
        default:
            throw new Error(`no edge for direction ${FocusDirection[direction]}`);
    }
}

export function distance(a: Point, b: Point): number {
    return Math.hypot(a.x - b.x, a.y - b.y);
}
