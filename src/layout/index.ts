// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

export { OutputNotMappedError } from "./lib/errors";
export { isWindowGroupAlive } from "./lib/layoutFocus";
export { firstRemainingOutput, TilingLayout } from "./lib/layoutModel";
export type { TilingLayoutOptions, UnmapOutputTarget } from "./lib/layoutModel";
export { LivenessMarker, validateTree } from "./lib/layoutNode";
export { PartitionTree } from "./lib/layoutTree";
export { TilingNodeSlot } from "./lib/nodeSlot";
export { FocusDirection, Orientation } from "./lib/types";
export type {
    Dimensions,
    Gaps,
    GroupData,
    KeyboardFocusTarget,
    MappedData,
    MappedEntry,
    NodeId,
    Output,
    OutputScale,
    Point,
    RenderElement,
    Seat,
    Size,
    Surface,
    SurfaceEntry,
    TilingData,
    TilingElement,
    WindowEntry,
    WindowGroup,
} from "./lib/types";
export { DefaultTilingSettings, loadSettingsFromEnv, setTilingSettings, settingsAtom } from "../store/settings";
export type { TilingSettings } from "../store/settings";
export { globalStore } from "../store/jotaiStore";
export type { JotaiStore } from "../store/jotaiStore";
