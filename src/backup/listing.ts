// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Read-only overview of the backup root.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Option, pipe } from "effect";
import type { Settings } from "../config/schema";
import type { ConfigError, SystemError } from "../lib/errors";
import { writeOutput } from "../lib/log";
import { decodeProjectName } from "../lib/types";
import { isDirectory, listDirectory } from "../system/fs";
import { listBackupSets } from "./artifacts";
import { readMetadata } from "./metadata";
import type { BackupSet } from "./types";

const BACKUP_DIR_PREFIX = "bak.";

export interface SetListing {
  readonly set: BackupSet;
  readonly metadata: Option.Option<ReadonlyArray<readonly [string, string]>>;
}

export interface ProjectListing {
  readonly project: string;
  readonly sets: readonly SetListing[];
}

/** Projects that have a `bak.<project>` directory, sorted by name. */
export const projectsWithBackups = (
  backupRoot: Settings["backupRoot"]
): Effect.Effect<readonly string[], SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* isDirectory(backupRoot))) {
      return [];
    }
    const names = yield* listDirectory(backupRoot);
    return yield* Effect.filter(
      pipe(
        names,
        Arr.filter((n) => n.startsWith(BACKUP_DIR_PREFIX) && n.length > BACKUP_DIR_PREFIX.length),
        Arr.map((n) => n.slice(BACKUP_DIR_PREFIX.length))
      ),
      (project) => isDirectory(`${backupRoot}/${BACKUP_DIR_PREFIX}${project}`)
    );
  });

export const collectListing = (
  settings: Settings,
  project: Option.Option<string>
): Effect.Effect<readonly ProjectListing[], SystemError | ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const projects = yield* Option.match(project, {
      onNone: () => projectsWithBackups(settings.backupRoot),
      onSome: (p) => Effect.map(decodeProjectName(p), (name): readonly string[] => [name]),
    });
    return yield* Effect.forEach(projects, (name) =>
      Effect.gen(function* () {
        const sets = yield* listBackupSets(settings.backupRoot, name);
        const listed = yield* Effect.forEach(sets, (set) =>
          Effect.map(readMetadata(set.dir), (metadata): SetListing => ({ set, metadata }))
        );
        return { project: name, sets: listed };
      })
    );
  });

export const renderListing = (listing: readonly ProjectListing[]): readonly string[] =>
  listing.length === 0
    ? ["No backups found"]
    : listing.flatMap(({ project, sets }) => [
        `${project}:`,
        ...(sets.length === 0
          ? ["  (no backup sets)"]
          : sets.flatMap(({ set, metadata }) => [
              `  ${set.timestamp}  ${set.complete ? "complete" : "INCOMPLETE"}  [${set.artifacts.join(", ")}]`,
              ...Option.match(metadata, {
                onNone: (): readonly string[] => [],
                onSome: (pairs) =>
                  pairs
                    .filter(([key]) => key !== "Project")
                    .map(([key, value]) => `    ${key}: ${value}`),
              }),
            ])),
      ]);

export const listBackups = (
  settings: Settings,
  project: Option.Option<string>
): Effect.Effect<void, SystemError | ConfigError, FileSystem.FileSystem> =>
  Effect.flatMap(collectListing(settings, project), (listing) =>
    Effect.forEach(renderListing(listing), writeOutput, { discard: true })
  );
