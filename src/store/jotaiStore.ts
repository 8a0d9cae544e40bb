// Copyright 2025, Command Line Inc.
// SPDX-License-Identifier: Apache-2.0

import { createStore } from "jotai/vanilla";

export type JotaiStore = ReturnType<typeof createStore>;

export const globalStore: JotaiStore = createStore();
