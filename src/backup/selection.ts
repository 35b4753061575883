// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Operator choices: a preset (from flags) is validated, otherwise the
 * Chooser is asked. None means the operator cancelled.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Option, pipe } from "effect";
import { BACKUP_MODE_VALUES, type BackupMode } from "../config/field-values";
import {
  BackupError,
  ConfigError,
  ErrorCode,
  GeneralError,
  type SystemError,
} from "../lib/errors";
import { type AbsolutePath, type ProjectName, isValidProjectName, pathJoin } from "../lib/types";
import { isDirectory, listDirectory } from "../system/fs";
import { Chooser } from "../system/services/chooser";
import type { BackupSet } from "./types";

const MODE_LABELS: Readonly<Record<BackupMode, string>> = {
  all: "Everything (web + media)",
  web_only: "Web only",
  media_only: "Media only",
};

/** Immediate subdirectories of the project root, sorted by name. */
export const listProjects = (
  projectRoot: AbsolutePath
): Effect.Effect<readonly ProjectName[], SystemError | GeneralError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* isDirectory(projectRoot))) {
      return yield* Effect.fail(
        new GeneralError({
          code: ErrorCode.GENERAL_ERROR,
          message: `Project root not found: ${projectRoot}`,
        })
      );
    }
    const names = yield* listDirectory(projectRoot);
    return yield* Effect.filter(
      names.filter((n): n is ProjectName => isValidProjectName(n)),
      (name) => isDirectory(pathJoin(projectRoot, name))
    );
  });

/** `preset` must name an existing project; an unknown name is a setup error. */
export const selectProject = (
  projectRoot: AbsolutePath,
  preset: Option.Option<string>
): Effect.Effect<
  Option.Option<ProjectName>,
  ConfigError | SystemError | GeneralError,
  FileSystem.FileSystem | Chooser
> =>
  Effect.gen(function* () {
    const projects = yield* listProjects(projectRoot);

    if (Option.isSome(preset)) {
      const wanted = preset.value;
      return yield* pipe(
        Arr.findFirst(projects, (p) => p === wanted),
        Option.match({
          onNone: () =>
            Effect.fail(
              new ConfigError({
                code: ErrorCode.GENERAL_ERROR,
                reason: "unknown-project",
                message: `Unknown project '${wanted}' (not a directory under ${projectRoot})`,
              })
            ),
          onSome: (p) => Effect.succeed(Option.some(p)),
        })
      );
    }

    if (projects.length === 0) {
      return yield* Effect.fail(
        new GeneralError({
          code: ErrorCode.GENERAL_ERROR,
          message: `No projects found under ${projectRoot}`,
        })
      );
    }

    const chooser = yield* Chooser;
    const picked = yield* chooser.choose("Select project", projects);
    return Option.flatMap(picked, (i) => Arr.get(projects, i));
  });

export const selectMode = (
  preset: Option.Option<BackupMode>
): Effect.Effect<Option.Option<BackupMode>, never, Chooser> =>
  Option.match(preset, {
    onSome: (mode) => Effect.succeed(Option.some(mode)),
    onNone: () =>
      Effect.gen(function* () {
        const chooser = yield* Chooser;
        const picked = yield* chooser.choose(
          "Select backup mode",
          BACKUP_MODE_VALUES.map((m) => MODE_LABELS[m])
        );
        return Option.flatMap(picked, (i) => Arr.get(BACKUP_MODE_VALUES, i));
      }),
  });

/** `sets` newest first; labels mark incomplete sets. */
export const selectBackupSet = (
  sets: readonly BackupSet[],
  preset: Option.Option<string>
): Effect.Effect<Option.Option<BackupSet>, BackupError, Chooser> =>
  Effect.gen(function* () {
    if (Option.isSome(preset)) {
      const wanted = preset.value;
      return yield* pipe(
        Arr.findFirst(sets, (s) => s.timestamp === wanted),
        Option.match({
          onNone: () =>
            Effect.fail(
              new BackupError({
                code: ErrorCode.GENERAL_ERROR,
                message: `Backup set '${wanted}' not found`,
              })
            ),
          onSome: (s) => Effect.succeed(Option.some(s)),
        })
      );
    }
    const chooser = yield* Chooser;
    const picked = yield* chooser.choose(
      "Select backup set",
      sets.map((s) => (s.complete ? s.timestamp : `${s.timestamp} (incomplete)`))
    );
    return Option.flatMap(picked, (i) => Arr.get(sets, i));
  });
