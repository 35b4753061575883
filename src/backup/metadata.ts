// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * metadata.txt: a plain `Key: value` summary written as the last file of a
 * backup set. Its presence is what marks the set complete.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Clock, Effect, Option, pipe } from "effect";
import type { BackupMode } from "../config/field-values";
import { formatLogTimestamp } from "../lib/effect-logger";
import type { SystemError } from "../lib/errors";
import { formatBytes } from "../lib/format";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { TOOL_VERSION } from "../lib/version";
import { fileSize, pathExists, readTextFile, writeTextFile } from "../system/fs";
import { ARTIFACT_FILES, ARTIFACT_KINDS, type ArtifactKind, METADATA_FILE } from "./types";

export const METADATA_HEADER = "=== Backup Metadata ===";

const SIZE_LABELS: Readonly<Record<ArtifactKind, string>> = {
  database: "DB-Backup-Size",
  web: "Web-Backup-Size",
  media: "Media-Backup-Size",
};

export interface MetadataInfo {
  readonly project: string;
  readonly date: Date;
  readonly mode: BackupMode;
  readonly compressionLevel: number;
  /** Sizes in bytes of the artifacts present; absent kinds get no line. */
  readonly sizes: Partial<Readonly<Record<ArtifactKind, number>>>;
}

export const renderMetadata = (info: MetadataInfo): string =>
  [
    METADATA_HEADER,
    `Project: ${info.project}`,
    `Date: ${formatLogTimestamp(info.date)}`,
    `Tool-Version: ${TOOL_VERSION}`,
    `Mode: ${info.mode}`,
    `Compression-Level: ${info.compressionLevel}`,
    ...pipe(
      ARTIFACT_KINDS,
      Arr.filterMap((kind) =>
        pipe(
          Option.fromNullable(info.sizes[kind]),
          Option.map((bytes) => `${SIZE_LABELS[kind]}: ${formatBytes(bytes)}`)
        )
      )
    ),
    "",
  ].join("\n");

/** `Key: value` pairs in file order; the header and malformed lines are skipped. */
export const parseMetadata = (content: string): ReadonlyArray<readonly [string, string]> =>
  pipe(
    content.split("\n"),
    Arr.filterMap((line) => {
      const idx = line.indexOf(": ");
      return idx > 0
        ? Option.some([line.slice(0, idx), line.slice(idx + 2).trimEnd()] as const)
        : Option.none();
    })
  );

type ArtifactSizes = Partial<Record<ArtifactKind, number>>;

/** Sizes of the artifact files present in `setDir`. */
export const artifactSizes = (
  setDir: AbsolutePath
): Effect.Effect<ArtifactSizes, never, FileSystem.FileSystem> => {
  const none: ArtifactSizes = {};
  return Effect.reduce(ARTIFACT_KINDS, none, (acc, kind) =>
    Effect.map(fileSize(pathJoin(setDir, ARTIFACT_FILES[kind])), (size) =>
      Option.match(size, {
        onNone: (): ArtifactSizes => acc,
        onSome: (bytes): ArtifactSizes => ({ ...acc, [kind]: bytes }),
      })
    )
  );
};

export const writeMetadata = (
  setDir: AbsolutePath,
  project: string,
  mode: BackupMode,
  compressionLevel: number
): Effect.Effect<AbsolutePath, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const sizes = yield* artifactSizes(setDir);
    const now = yield* Clock.currentTimeMillis;
    const target = pathJoin(setDir, METADATA_FILE);
    yield* writeTextFile(
      target,
      renderMetadata({ project, date: new Date(now), mode, compressionLevel, sizes })
    );
    return target;
  });

/** None for an incomplete set. */
export const readMetadata = (
  setDir: AbsolutePath
): Effect.Effect<
  Option.Option<ReadonlyArray<readonly [string, string]>>,
  SystemError,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const target = pathJoin(setDir, METADATA_FILE);
    if (!(yield* pathExists(target))) {
      return Option.none();
    }
    return Option.some(parseMetadata(yield* readTextFile(target)));
  });
