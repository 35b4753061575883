// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { readdirSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { planRotation, rotate } from "../../src/backup/retention";
import type { BackupSet } from "../../src/backup/types";
import { type AbsolutePath, path } from "../../src/lib/types";
import { backupSet, createSet, makeTempRoot, removeTempRoot } from "../helpers/fixtures";
import { runTest } from "../helpers/layers";

const ids = (sets: readonly BackupSet[]): readonly string[] => sets.map((s) => s.timestamp);

describe("planRotation", () => {
  // Newest first, as listBackupSets returns them.
  const sets = [
    backupSet("20240105_000000"),
    backupSet("20240104_000000", { complete: false }),
    backupSet("20240103_000000"),
    backupSet("20240102_000000", { complete: false }),
    backupSet("20240101_000000"),
  ];

  test("keeps the newest complete sets and removes the rest oldest first", () => {
    const plan = planRotation(sets, 2);

    expect(ids(plan.keep)).toEqual(["20240105_000000", "20240104_000000", "20240103_000000"]);
    expect(ids(plan.remove)).toEqual(["20240101_000000", "20240102_000000"]);
  });

  test("incomplete sets newer than the oldest kept set are not counted", () => {
    const plan = planRotation(sets, 1);

    expect(ids(plan.keep)).toEqual(["20240105_000000"]);
    expect(ids(plan.remove)).toEqual([
      "20240101_000000",
      "20240102_000000",
      "20240103_000000",
      "20240104_000000",
    ]);
  });

  test("a keep count above the number of sets removes nothing", () => {
    const plan = planRotation(sets, 10);

    expect(ids(plan.keep)).toEqual(ids(sets));
    expect(plan.remove).toEqual([]);
  });

  test.each([0, -1])("keep %d removes every set", (keep) => {
    const plan = planRotation(sets, keep);

    expect(plan.keep).toEqual([]);
    expect(ids(plan.remove)).toEqual([...ids(sets)].reverse());
  });

  test("without a complete set incomplete sets are left alone", () => {
    const onlyIncomplete = [
      backupSet("20240102_000000", { complete: false }),
      backupSet("20240101_000000", { complete: false }),
    ];

    expect(planRotation(onlyIncomplete, 1).remove).toEqual([]);
  });
});

describe("rotate", () => {
  let root: AbsolutePath;

  beforeEach(() => {
    root = makeTempRoot();
  });

  afterEach(() => {
    removeTempRoot(root);
  });

  test("deletes the planned directories and ignores foreign entries", async () => {
    createSet(root, "shop", "20240101_000000");
    createSet(root, "shop", "20240102_000000");
    createSet(root, "shop", "20240103_000000");
    createSet(root, "shop", "notes");

    const plan = await runTest(rotate(path(`${root}/backup`), "shop", 1));

    expect(ids(plan.remove)).toEqual(["20240101_000000", "20240102_000000"]);
    expect(readdirSync(`${root}/backup/bak.shop`).sort()).toEqual(["20240103_000000", "notes"]);
  });

  test("a project without backups has nothing to rotate", async () => {
    createSet(root, "other", "20240101_000000");

    const plan = await runTest(rotate(path(`${root}/backup`), "shop", 0));

    expect(plan).toEqual({ keep: [], remove: [] });
    expect(readdirSync(`${root}/backup/bak.other`)).toEqual(["20240101_000000"]);
  });
});
