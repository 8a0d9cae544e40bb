// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import type { JotaiStore } from "@/store/jotaiStore";
import { createStore } from "jotai/vanilla";
import { TilingNodeSlot } from "../lib/nodeSlot";
import type {
    Dimensions,
    FocusDirection,
    Output,
    OutputScale,
    Point,
    RenderElement,
    Seat,
    Size,
    SurfaceEntry,
    TilingElement,
} from "../lib/types";

export class FakeOutput implements Output {
    readonly name: string;
    area: Dimensions;
    zone: Dimensions;
    scale: OutputScale = { fractional: 1, integer: 1 };

    constructor(name: string, width: number, height: number) {
        this.name = name;
        this.area = { left: 0, top: 0, width, height };
        this.zone = { ...this.area };
    }

    geometry(): Dimensions {
        return this.area;
    }

    currentScale(): OutputScale {
        return this.scale;
    }

    nonExclusiveZone(): Dimensions {
        return this.zone;
    }
}

export class FakeSeat implements Seat {
    output: Output;

    constructor(output: Output) {
        this.output = output;
    }

    activeOutput(): Output {
        return this.output;
    }
}

export class FakeElement implements TilingElement {
    readonly name: string;
    readonly tilingNodeId: TilingNodeSlot;
    isAlive = true;
    fullscreen = false;
    tiled = false;
    sizes: Size[] = [];
    configureCount = 0;
    focusHandled: FocusDirection[] = [];
    consumeFocus = false;

    constructor(name: string, store: JotaiStore) {
        this.name = name;
        this.tilingNodeId = new TilingNodeSlot(store);
    }

    get lastSize(): Size | undefined {
        return this.sizes[this.sizes.length - 1];
    }

    alive(): boolean {
        return this.isAlive;
    }

    isFullscreen(): boolean {
        return this.fullscreen;
    }

    handleFocus(direction: FocusDirection): boolean {
        this.focusHandled.push(direction);
        return this.consumeFocus;
    }

    setTiled(tiled: boolean) {
        this.tiled = tiled;
    }

    setSize(size: Size) {
        this.sizes.push(size);
    }

    configure() {
        this.configureCount++;
    }

    windows(): Iterable<SurfaceEntry> {
        return [
            { surface: { id: `${this.name}-main` }, offset: { x: 0, y: 0 } },
            { surface: { id: `${this.name}-popup` }, offset: { x: 10, y: 20 } },
        ];
    }

    renderElements(location: Point, scale: number): RenderElement[] {
        return [{ surface: { id: `${this.name}-main` }, location, scale }];
    }
}

export function newTestStore(): JotaiStore {
    return createStore();
}
