// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Retention: keep the newest N complete backup sets of a project.
 * Only complete sets count toward N. Incomplete sets older than the oldest
 * kept set are removed too; newer ones stay for inspection.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Option, pipe } from "effect";
import type { SystemError } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { removePath } from "../system/fs";
import { listBackupSets } from "./artifacts";
import type { BackupSet } from "./types";

export interface RotationPlan {
  readonly keep: readonly BackupSet[];
  /** Oldest first, the order deletions run in. */
  readonly remove: readonly BackupSet[];
}

/** `sets` newest first, as listBackupSets returns them. */
export const planRotation = (sets: readonly BackupSet[], keepCount: number): RotationPlan => {
  if (keepCount <= 0) {
    return { keep: [], remove: [...sets].reverse() };
  }
  const kept = pipe(
    sets.filter((s) => s.complete),
    Arr.take(keepCount)
  );
  const oldestKept = Option.map(Arr.last(kept), (s) => s.timestamp);
  const keptIds = new Set(kept.map((s) => s.timestamp));

  const shouldRemove = (set: BackupSet): boolean =>
    set.complete
      ? !keptIds.has(set.timestamp)
      : Option.match(oldestKept, {
          // No complete set to anchor on: incomplete sets are left alone.
          onNone: () => false,
          onSome: (oldest) => set.timestamp < oldest,
        });

  return {
    keep: sets.filter((s) => !shouldRemove(s)),
    remove: sets.filter(shouldRemove).reverse(),
  };
};

/** Deletes what planRotation selects. Any failed deletion aborts the run. */
export const rotate = (
  backupRoot: AbsolutePath,
  project: string,
  keepCount: number
): Effect.Effect<RotationPlan, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (keepCount <= 0) {
      yield* Effect.logWarning(
        `Retention keep count is ${keepCount}: ALL backups of ${project} will be deleted`
      );
    }
    yield* Effect.logInfo(`Rotating backups of ${project} (keeping the newest ${Math.max(keepCount, 0)})`);

    const sets = yield* listBackupSets(backupRoot, project);
    const plan = planRotation(sets, keepCount);

    yield* Effect.forEach(
      plan.remove,
      (set) =>
        Effect.zipRight(
          Effect.logWarning(
            `Deleting ${set.complete ? "old" : "incomplete"} backup set: ${set.dir}`
          ),
          removePath(set.dir)
        ),
      { discard: true }
    );
    return plan;
  });
