// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { formatBackupTimestamp } from "../../src/backup/timestamp";
import { isBackupTimestamp } from "../../src/lib/types";

describe("formatBackupTimestamp", () => {
  test("zero-pads every field", () => {
    expect(formatBackupTimestamp(new Date(2024, 0, 5, 3, 4, 5))).toBe("20240105_030405");
  });

  test("orders chronologically as strings", () => {
    const earlier = formatBackupTimestamp(new Date(2024, 8, 30, 23, 59, 59));
    const later = formatBackupTimestamp(new Date(2024, 9, 1, 0, 0, 0));
    expect(earlier < later).toBe(true);
  });

  test("produces names recognised as backup sets", () => {
    expect(isBackupTimestamp(formatBackupTimestamp(new Date(2025, 11, 31, 12, 0, 0)))).toBe(true);
    expect(isBackupTimestamp("2025-12-31")).toBe(false);
  });
});
