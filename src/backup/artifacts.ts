// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Creates, verifies and enumerates backup artifacts.
 * Each creation step fails with the exit code of its own kind.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Option, Order, pipe } from "effect";
import type { Compressor } from "../config/field-values";
import {
  BackupError,
  type BackupErrorCode,
  ErrorCode,
  type SystemError,
  causeProps,
} from "../lib/errors";
import { formatBytes } from "../lib/format";
import { logSuccess } from "../lib/log";
import {
  type AbsolutePath,
  type BackupTimestamp,
  isBackupTimestamp,
  pathJoin,
} from "../lib/types";
import { describeFailure, pipelineFailureDetail, pipelineSucceeded } from "../system/exec";
import { fileSize, isDirectory, listDirectory, pathExists } from "../system/fs";
import { type ArchiveRequest, Archiver } from "../system/services/archiver";
import { Database } from "../system/services/database";
import {
  ARTIFACT_FILES,
  ARTIFACT_KINDS,
  type BackupSet,
  CorruptArtifact,
  type DbCredentials,
  METADATA_FILE,
  projectBackupDirName,
} from "./types";

const ARCHIVE_ERROR_CODE: Readonly<Record<"web" | "media", BackupErrorCode>> = {
  web: ErrorCode.WEB_ARCHIVE_FAILED,
  media: ErrorCode.MEDIA_ARCHIVE_FAILED,
};

const dumpFailed = (message: string, path: string, e?: unknown): BackupError =>
  new BackupError({
    code: ErrorCode.DUMP_FAILED,
    message,
    path,
    ...causeProps(e),
  });

/**
 * `mysqldump > destPath`. A zero exit alone is not trusted: the dump file
 * must also exist and be non-empty.
 */
export const createDatabaseDump = (
  credentials: DbCredentials,
  destPath: AbsolutePath
): Effect.Effect<number, BackupError, Database | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const db = yield* Database;
    const result = yield* pipe(
      db.dump(credentials, destPath),
      Effect.mapError((e) => dumpFailed(`Database dump failed: ${e.message}`, destPath, e))
    );
    if (result.exitCode !== 0) {
      return yield* Effect.fail(
        dumpFailed(`Database dump failed (${describeFailure(result)})`, destPath)
      );
    }

    const size = yield* fileSize(destPath);
    return yield* Option.match(Option.filter(size, (bytes) => bytes > 0), {
      onNone: () => Effect.fail(dumpFailed(`Database dump is missing or empty: ${destPath}`, destPath)),
      onSome: (bytes) =>
        Effect.as(logSuccess(`Database dump written: ${formatBytes(bytes)}`), bytes),
    });
  });

/**
 * `tar -cf - … | <compressor> -<level> > destPath`. Both stages must exit 0:
 * a tar failure is caught even when the compressor saw a clean EOF.
 */
export const createArchive = (
  request: ArchiveRequest,
  artifact: "web" | "media"
): Effect.Effect<number, BackupError, Archiver | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const archiver = yield* Archiver;
    const code = ARCHIVE_ERROR_CODE[artifact];
    const failed = (message: string, e?: unknown): BackupError =>
      new BackupError({ code, message, path: request.destPath, ...causeProps(e) });

    const result = yield* pipe(
      archiver.create(request),
      Effect.mapError((e) => failed(`${artifact} archive failed: ${e.message}`, e))
    );
    if (!pipelineSucceeded(result)) {
      return yield* Effect.fail(
        failed(`${artifact} archive failed (${pipelineFailureDetail(result)})`)
      );
    }

    const bytes = Option.getOrElse(yield* fileSize(request.destPath), () => 0);
    yield* logSuccess(`${artifact} archive written: ${formatBytes(bytes)}`);
    return bytes;
  });

/**
 * Integrity test. Advisory: a failing archive is reported as a value and
 * left on disk.
 */
export const verifyArtifact = (
  archivePath: string,
  compressor: Compressor
): Effect.Effect<Option.Option<CorruptArtifact>, never, Archiver> =>
  Effect.gen(function* () {
    const archiver = yield* Archiver;
    yield* Effect.logInfo(`Verifying archive integrity: ${archivePath}`);
    const detail = yield* pipe(
      archiver.test(archivePath, compressor),
      Effect.map((r) => (r.exitCode === 0 ? Option.none<string>() : Option.some(describeFailure(r)))),
      Effect.catchAll((e) => Effect.succeed(Option.some(e.message)))
    );
    return yield* Option.match(detail, {
      onNone: () => Effect.succeed(Option.none<CorruptArtifact>()),
      onSome: (d) =>
        Effect.as(
          Effect.logWarning(`Archive failed integrity test, kept for inspection: ${archivePath} (${d})`),
          Option.some(new CorruptArtifact({ path: archivePath, detail: d }))
        ),
    });
  });

export const projectBackupDir = (backupRoot: AbsolutePath, project: string): AbsolutePath =>
  pathJoin(backupRoot, projectBackupDirName(project));

export const hasBackupDirectory = (
  backupRoot: AbsolutePath,
  project: string
): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  isDirectory(projectBackupDir(backupRoot, project));

const describeSet = (
  dir: AbsolutePath,
  timestamp: BackupTimestamp
): Effect.Effect<BackupSet, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const complete = yield* pathExists(pathJoin(dir, METADATA_FILE));
    const artifacts = yield* Effect.filter(ARTIFACT_KINDS, (kind) =>
      pathExists(pathJoin(dir, ARTIFACT_FILES[kind]))
    );
    return { timestamp, dir, complete, artifacts };
  });

const byTimestampDesc: Order.Order<BackupSet> = Order.reverse(
  Order.mapInput(Order.string, (s: BackupSet) => s.timestamp)
);

/**
 * Backup sets of `project`, newest first. Entries whose name is not a
 * `YYYYMMDD_HHMMSS` directory are ignored; a missing project directory
 * yields an empty list.
 */
export const listBackupSets = (
  backupRoot: AbsolutePath,
  project: string
): Effect.Effect<readonly BackupSet[], SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const base = projectBackupDir(backupRoot, project);
    if (!(yield* isDirectory(base))) {
      return [];
    }
    const names = yield* listDirectory(base);
    const sets = yield* Effect.forEach(
      names.filter(isBackupTimestamp),
      (name) =>
        Effect.gen(function* () {
          const dir = pathJoin(base, name);
          return (yield* isDirectory(dir))
            ? Option.some(yield* describeSet(dir, name))
            : Option.none<BackupSet>();
        })
    );
    return pipe(Arr.getSomes(sets), Arr.sort(byTimestampDesc));
  });
