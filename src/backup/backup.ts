// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Backup run:
 * select project and mode, create the set directory, read credentials,
 * clean the template cache, dump, archive web and/or media, write
 * metadata last, rotate.
 *
 * From directory creation on, every log record is also appended to the
 * set's backup.log. A failure before metadata is written triggers the
 * cleanup hook: a set directory without artifacts is removed, one with
 * partial artifacts is left and named in a warning.
 */

import type { FileSystem } from "@effect/platform";
import { Clock, Effect, Option, pipe } from "effect";
import type { BackupMode } from "../config/field-values";
import type { BackupPresets, Settings } from "../config/schema";
import { TranscriptLoggerLive, recordTranscriptFailure } from "../lib/effect-logger";
import {
  type BackupError,
  type ConfigError,
  ErrorCode,
  type GeneralError,
  SystemError,
} from "../lib/errors";
import { formatDuration } from "../lib/format";
import { createStepCounter, logSuccess, withProject } from "../lib/log";
import { type AbsolutePath, type ProjectName, pathJoin } from "../lib/types";
import { ensureDirectory, isDirectory, listDirectory, removePath } from "../system/fs";
import { type ArchiveRequest, type Archiver, tarCreateArgs } from "../system/services/archiver";
import type { Chooser } from "../system/services/chooser";
import type { Database } from "../system/services/database";
import { createArchive, createDatabaseDump, projectBackupDir, verifyArtifact } from "./artifacts";
import { cleanTemplateCache } from "./cache";
import { readLiveCredentials } from "./credentials";
import { writeMetadata } from "./metadata";
import { rotate } from "./retention";
import { selectMode, selectProject } from "./selection";
import { currentBackupTimestamp } from "./timestamp";
import { ARTIFACT_FILES, RunOutcome, TRANSCRIPT_FILE, artifactsForMode } from "./types";

export type BackupRunError = ConfigError | SystemError | GeneralError | BackupError;

export type BackupRunEnv = FileSystem.FileSystem | Chooser | Database | Archiver;

interface BackupPlan {
  readonly project: ProjectName;
  readonly mode: BackupMode;
  readonly projectDir: AbsolutePath;
  readonly setDir: AbsolutePath;
  readonly web: Option.Option<ArchiveRequest>;
  readonly media: Option.Option<ArchiveRequest>;
}

export const buildBackupPlan = (
  settings: Settings,
  project: ProjectName,
  mode: BackupMode,
  setDir: AbsolutePath
): BackupPlan => {
  const projectDir = pathJoin(settings.projectRoot, project);
  const kinds = artifactsForMode(mode);
  const archive = (sourceRoot: string, paths: readonly string[], exclude: readonly string[], file: string): ArchiveRequest => ({
    sourceRoot,
    paths,
    exclude,
    destPath: pathJoin(setDir, file),
    compressor: settings.compressor,
    level: settings.compressionLevel,
  });
  return {
    project,
    mode,
    projectDir,
    setDir,
    web: kinds.includes("web")
      ? Option.some(archive(settings.projectRoot, [project], settings.project.webExclude, ARTIFACT_FILES.web))
      : Option.none(),
    media: kinds.includes("media")
      ? Option.some(archive(projectDir, [settings.project.mediaDir], [], ARTIFACT_FILES.media))
      : Option.none(),
  };
};

const describePlan = (settings: Settings, plan: BackupPlan): Effect.Effect<void> =>
  Effect.forEach(
    [
      `Dry run: nothing will be written`,
      `Project directory: ${plan.projectDir}`,
      `Backup set: ${plan.setDir}`,
      `Mode: ${plan.mode}`,
      `Database dump: ${pathJoin(plan.setDir, ARTIFACT_FILES.database)}`,
      ...Option.match(plan.web, {
        onNone: () => [],
        onSome: (r) => [`Web archive: ${tarCreateArgs(r).join(" ")} | ${r.compressor} -${r.level} > ${r.destPath}`],
      }),
      ...Option.match(plan.media, {
        onNone: () => [],
        onSome: (r) => [`Media archive: ${tarCreateArgs(r).join(" ")} | ${r.compressor} -${r.level} > ${r.destPath}`],
      }),
      `Template cache: ${pathJoin(plan.projectDir, settings.project.cacheDir)} (keeping ${settings.project.cacheProtected.join(", ")})`,
      `Retention: keep ${settings.keep} complete set(s)`,
    ],
    (line) => Effect.logInfo(line),
    { discard: true }
  );

/**
 * Cleanup hook for a failed run. Removes the set directory when it holds no
 * artifact (nothing, or only backup.log); otherwise leaves it and warns.
 */
export const cleanupFailedSet = (
  setDir: AbsolutePath
): Effect.Effect<void, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* isDirectory(setDir))) {
      return;
    }
    const entries = yield* pipe(
      listDirectory(setDir),
      Effect.orElseSucceed((): readonly string[] => [])
    );
    const artifacts = entries.filter((e) => e !== TRANSCRIPT_FILE);
    if (artifacts.length === 0) {
      yield* Effect.logWarning(`Removing empty backup directory: ${setDir}`);
      yield* pipe(
        removePath(setDir),
        Effect.catchAll((e) => Effect.logError(`Could not remove ${setDir}: ${e.message}`))
      );
    } else {
      yield* Effect.logWarning(
        `Incomplete backup set left for inspection: ${setDir} (contains ${artifacts.join(", ")})`
      );
    }
  });

/** Dump, archives and metadata; everything that makes a set complete. */
const produceSet = (
  settings: Settings,
  plan: BackupPlan
): Effect.Effect<void, BackupRunError, BackupRunEnv> =>
  Effect.gen(function* () {
    const archives = [plan.web, plan.media].filter(Option.isSome).length;
    const steps = yield* createStepCounter(archives + 5);

    yield* steps.next("Reading database credentials");
    const credentials = yield* readLiveCredentials(plan.projectDir, settings.project);
    yield* logSuccess(`Credentials read for database '${credentials.name}'`);

    yield* steps.next("Cleaning template cache");
    yield* cleanTemplateCache(
      pathJoin(plan.projectDir, settings.project.cacheDir),
      settings.project.cacheProtected,
      settings.cache
    );

    yield* steps.next("Dumping database");
    yield* createDatabaseDump(credentials, pathJoin(plan.setDir, ARTIFACT_FILES.database));

    yield* Option.match(plan.web, {
      onNone: () => Effect.void,
      onSome: (request) =>
        Effect.gen(function* () {
          yield* steps.next(`Archiving web directory (excluding ${request.exclude.join(", ")})`);
          yield* createArchive(request, "web");
          yield* verifyArtifact(request.destPath, request.compressor);
        }),
    });

    yield* Option.match(plan.media, {
      onNone: () => Effect.void,
      onSome: (request) =>
        Effect.gen(function* () {
          yield* steps.next("Archiving media directory");
          yield* createArchive(request, "media");
          yield* verifyArtifact(request.destPath, request.compressor);
        }),
    });

    yield* steps.next("Writing metadata");
    yield* writeMetadata(plan.setDir, plan.project, plan.mode, settings.compressionLevel);
  });

/** Everything after project and mode are fixed. */
const runSelected = (
  settings: Settings,
  project: ProjectName,
  mode: BackupMode,
  dryRun: boolean
): Effect.Effect<RunOutcome, BackupRunError, BackupRunEnv> =>
  Effect.gen(function* () {
    const startedAt = yield* Clock.currentTimeMillis;
    const timestamp = yield* currentBackupTimestamp;
    const setDir = pathJoin(projectBackupDir(settings.backupRoot, project), timestamp);
    const plan = buildBackupPlan(settings, project, mode, setDir);

    if (dryRun) {
      yield* describePlan(settings, plan);
      return RunOutcome.Planned({ project, setDir });
    }

    yield* pipe(
      ensureDirectory(setDir),
      Effect.mapError(
        (e) =>
          new SystemError({
            code: ErrorCode.GENERAL_ERROR,
            message: `Could not create backup directory ${setDir}: ${e.message}`,
            path: setDir,
          })
      )
    );

    const transcript = pathJoin(setDir, TRANSCRIPT_FILE);
    yield* pipe(
      Effect.gen(function* () {
        yield* Effect.logInfo(`Backup directory created: ${setDir} (mode ${mode})`);
        yield* pipe(
          produceSet(settings, plan),
          Effect.tapError((e) => recordTranscriptFailure(e.message)),
          Effect.onInterrupt(() => recordTranscriptFailure("Backup interrupted")),
          Effect.onError(() => cleanupFailedSet(setDir))
        );
        yield* rotate(settings.backupRoot, project, settings.keep);
        const finishedAt = yield* Clock.currentTimeMillis;
        yield* Effect.logInfo(`Elapsed: ${formatDuration(finishedAt - startedAt)}`);
        yield* logSuccess(`Backup complete: ${setDir}`);
      }),
      Effect.provide(TranscriptLoggerLive(transcript))
    );

    return RunOutcome.Completed({ project, setDir });
  }).pipe(withProject(project));

export const runBackup = (
  settings: Settings,
  presets: BackupPresets
): Effect.Effect<RunOutcome, BackupRunError, BackupRunEnv> =>
  Effect.gen(function* () {
    yield* Effect.logInfo("Backup started");

    const project = yield* selectProject(settings.projectRoot, presets.project);
    if (Option.isNone(project)) {
      yield* Effect.logWarning("No project selected; backup cancelled");
      return RunOutcome.Cancelled({ reason: "no project selected" });
    }
    const mode = yield* selectMode(presets.mode);
    if (Option.isNone(mode)) {
      yield* Effect.logWarning("No mode selected; backup cancelled");
      return RunOutcome.Cancelled({ reason: "no mode selected" });
    }
    return yield* runSelected(settings, project.value, mode.value, presets.dryRun);
  }).pipe(Effect.annotateLogs("operation", "backup"));
