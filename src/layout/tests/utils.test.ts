// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import { assert, expect, test } from "vitest";
import { FocusDirection, Orientation, type Dimensions } from "../lib/types";
import {
    directionAxis,
    enteringEdgeMidpoint,
    leavingEdgeMidpoint,
    orientationForArea,
    shrinkDimensions,
    sliceDimensions,
} from "../lib/utils";

test("orientationForArea", () => {
    assert.equal(orientationForArea({ left: 0, top: 0, width: 200, height: 100 }), Orientation.Vertical);
    assert.equal(orientationForArea({ left: 0, top: 0, width: 100, height: 200 }), Orientation.Horizontal);
    assert.equal(orientationForArea({ left: 0, top: 0, width: 100, height: 100 }), Orientation.Horizontal);
});

test("sliceDimensions", () => {
    const dimensions: Dimensions = { left: 10, top: 20, width: 100, height: 60 };
    assert.deepEqual(sliceDimensions(dimensions, Orientation.Vertical, [30, 70]), [
        { left: 10, top: 20, width: 30, height: 60 },
        { left: 40, top: 20, width: 70, height: 60 },
    ]);
    assert.deepEqual(sliceDimensions(dimensions, Orientation.Horizontal, [20, 40]), [
        { left: 10, top: 20, width: 100, height: 20 },
        { left: 10, top: 40, width: 100, height: 40 },
    ]);
});

test("shrinkDimensions clamps at zero", () => {
    assert.deepEqual(shrinkDimensions({ left: 0, top: 0, width: 100, height: 6 }, 4), {
        left: 4,
        top: 4,
        width: 92,
        height: 0,
    });
});

test("edge midpoints", () => {
    const dimensions: Dimensions = { left: 0, top: 0, width: 100, height: 50 };
    assert.deepEqual(leavingEdgeMidpoint(dimensions, FocusDirection.Right), { x: 100, y: 25 });
    assert.deepEqual(enteringEdgeMidpoint(dimensions, FocusDirection.Right), { x: 0, y: 25 });
    assert.deepEqual(leavingEdgeMidpoint(dimensions, FocusDirection.Up), { x: 50, y: 0 });
    assert.deepEqual(enteringEdgeMidpoint(dimensions, FocusDirection.Up), { x: 50, y: 50 });
    expect(() => leavingEdgeMidpoint(dimensions, FocusDirection.Out)).toThrow("no edge for direction Out");
});

test("directionAxis", () => {
    assert.equal(directionAxis(FocusDirection.Left), Orientation.Vertical);
    assert.equal(directionAxis(FocusDirection.Down), Orientation.Horizontal);
    assert.equal(directionAxis(FocusDirection.Out), undefined);
});
