// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Human-readable sizes and durations for logs and metadata.
 * Data-driven thresholds, checked in descending order.
 */

import { Array as Arr, Option, pipe } from "effect";

interface ThresholdEntry {
  readonly threshold: number;
  readonly format: (value: number) => string;
}

const BYTE_THRESHOLDS: readonly ThresholdEntry[] = [
  { threshold: 1024 ** 3, format: (b): string => `${(b / 1024 ** 3).toFixed(2)} GB` },
  { threshold: 1024 ** 2, format: (b): string => `${(b / 1024 ** 2).toFixed(2)} MB` },
  { threshold: 1024, format: (b): string => `${(b / 1024).toFixed(2)} KB` },
];

/** @example formatBytes(1536) // "1.50 KB" */
export const formatBytes = (bytes: number): string =>
  pipe(
    BYTE_THRESHOLDS,
    Arr.findFirst((t) => bytes >= t.threshold),
    Option.match({
      onNone: (): string => `${bytes} B`,
      onSome: (t): string => t.format(bytes),
    })
  );

const DURATION_THRESHOLDS: readonly ThresholdEntry[] = [
  {
    threshold: 60000,
    format: (ms): string => `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`,
  },
  { threshold: 1000, format: (ms): string => `${(ms / 1000).toFixed(1)}s` },
];

export const formatDuration = (ms: number): string =>
  pipe(
    DURATION_THRESHOLDS,
    Arr.findFirst((t) => ms >= t.threshold),
    Option.match({
      onNone: (): string => `${ms}ms`,
      onSome: (t): string => t.format(ms),
    })
  );
