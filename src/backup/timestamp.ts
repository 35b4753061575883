// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Clock, Effect } from "effect";
import type { BackupTimestamp } from "../lib/types";

const pad2 = (n: number): string => String(n).padStart(2, "0");

/** `YYYYMMDD_HHMMSS` in local time. */
export const formatBackupTimestamp = (date: Date): BackupTimestamp =>
  `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}_${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}` as BackupTimestamp;

export const currentBackupTimestamp: Effect.Effect<BackupTimestamp> = Effect.map(
  Clock.currentTimeMillis,
  (ms) => formatBackupTimestamp(new Date(ms))
);
