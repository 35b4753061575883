// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdirSync, writeFileSync } from "node:fs";
import { Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  collectListing,
  projectsWithBackups,
  renderListing,
} from "../../src/backup/listing";
import { type AbsolutePath, path } from "../../src/lib/types";
import {
  backupSet,
  createSet,
  makeTempRoot,
  removeTempRoot,
  testSettings,
} from "../helpers/fixtures";
import { runTest } from "../helpers/layers";

describe("renderListing", () => {
  test("an empty backup root", () => {
    expect(renderListing([])).toEqual(["No backups found"]);
  });

  test("one line per set plus its metadata without the project", () => {
    expect(
      renderListing([
        {
          project: "shop",
          sets: [
            {
              set: backupSet("20240102_000000", { artifacts: ["database", "web"] }),
              metadata: Option.some([
                ["Project", "shop"],
                ["Mode", "web_only"],
              ]),
            },
            {
              set: backupSet("20240101_000000", { complete: false, artifacts: ["database"] }),
              metadata: Option.none(),
            },
          ],
        },
        { project: "outlet", sets: [] },
      ])
    ).toEqual([
      "shop:",
      "  20240102_000000  complete  [database, web]",
      "    Mode: web_only",
      "  20240101_000000  INCOMPLETE  [database]",
      "outlet:",
      "  (no backup sets)",
    ]);
  });
});

describe("collecting from disk", () => {
  let root: AbsolutePath;

  beforeEach(() => {
    root = makeTempRoot();
  });

  afterEach(() => {
    removeTempRoot(root);
  });

  test("projectsWithBackups finds bak.* directories only", async () => {
    createSet(root, "shop", "20240101_000000");
    mkdirSync(`${root}/backup/bak.outlet`, { recursive: true });
    mkdirSync(`${root}/backup/bak.`, { recursive: true });
    writeFileSync(`${root}/backup/bak.file`, "");
    mkdirSync(`${root}/backup/other`, { recursive: true });

    expect(await runTest(projectsWithBackups(path(`${root}/backup`)))).toEqual(["outlet", "shop"]);
  });

  test("a missing backup root lists nothing", async () => {
    expect(await runTest(projectsWithBackups(path(`${root}/backup`)))).toEqual([]);
  });

  test("collectListing for one project reads metadata of complete sets", async () => {
    createSet(root, "shop", "20240101_000000");
    createSet(root, "shop", "20240102_000000", { complete: false, files: ["db_backup.sql"] });
    const listing = await runTest(collectListing(testSettings(root), Option.some("shop")));

    expect(renderListing(listing)).toEqual([
      "shop:",
      "  20240102_000000  INCOMPLETE  [database]",
      "  20240101_000000  complete  [database, web, media]",
      "    Mode: all",
    ]);
  });
});
