// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Restore run. Destructive: drops every table of the shop database and
 * empties the web root before unpacking the chosen set. Nothing is touched
 * until the operator has typed the confirmation word.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import type { RestorePresets, Settings } from "../config/schema";
import {
  BackupError,
  type ConfigError,
  ErrorCode,
  type GeneralError,
  RestoreError,
  type RestoreErrorCode,
  SystemError,
  causeProps,
} from "../lib/errors";
import { createStepCounter, logSuccess, withProject } from "../lib/log";
import { type AbsolutePath, type ProjectName, pathJoin } from "../lib/types";
import { describeFailure } from "../system/exec";
import { emptyDirectory } from "../system/fs";
import { Archiver } from "../system/services/archiver";
import { Chooser } from "../system/services/chooser";
import { Database, buildDropTablesSql } from "../system/services/database";
import { hasBackupDirectory, listBackupSets, projectBackupDir } from "./artifacts";
import { extractCredentialsFromArchive, readLiveCredentials } from "./credentials";
import { selectBackupSet, selectProject } from "./selection";
import { ARTIFACT_FILES, type BackupSet, type DbCredentials, RunOutcome, hasArtifact } from "./types";

/** The only answer that lets a restore proceed. */
export const CONFIRMATION_WORD = "ja";

export type RestoreRunError = ConfigError | SystemError | GeneralError | BackupError | RestoreError;

export type RestoreRunEnv = FileSystem.FileSystem | Chooser | Database | Archiver;

const backupNotFound = (message: string, path: string): BackupError =>
  new BackupError({ code: ErrorCode.GENERAL_ERROR, message, path });

export const isConfirmed = (answer: string): boolean => answer === CONFIRMATION_WORD;

export const confirmationWarning = (
  project: ProjectName,
  set: BackupSet,
  webRoot: AbsolutePath
): readonly string[] => [
  `Restoring ${project} from backup ${set.timestamp}`,
  `This will DROP ALL TABLES of the project database`,
  `This will DELETE EVERYTHING inside ${webRoot}`,
  `This will overwrite the site with the contents of ${set.dir}`,
];

const confirm = (
  project: ProjectName,
  set: BackupSet,
  webRoot: AbsolutePath,
  preset: Option.Option<string>
): Effect.Effect<boolean, never, Chooser> =>
  Effect.gen(function* () {
    yield* Effect.forEach(confirmationWarning(project, set, webRoot), (line) => Effect.logWarning(line), {
      discard: true,
    });
    const answer = yield* Option.match(preset, {
      onSome: (token) => Effect.succeed(token),
      onNone: () =>
        Effect.flatMap(Chooser, (chooser) =>
          chooser.ask(`Type '${CONFIRMATION_WORD}' to continue`)
        ),
    });
    return isConfirmed(answer);
  });

/**
 * Credentials as they were when the set was taken. A set without a web
 * archive has none, so the live config file is used instead.
 */
const credentialsFor = (
  settings: Settings,
  project: ProjectName,
  set: BackupSet,
  webRoot: AbsolutePath
): Effect.Effect<DbCredentials, ConfigError | SystemError | GeneralError, FileSystem.FileSystem | Archiver> =>
  hasArtifact(set, "web")
    ? extractCredentialsFromArchive(pathJoin(set.dir, ARTIFACT_FILES.web), project, settings.project)
    : Effect.zipRight(
        Effect.logWarning(
          `Backup ${set.timestamp} has no web archive; using the live configuration file`
        ),
        readLiveCredentials(webRoot, settings.project)
      );

const dropAllTables = (
  credentials: DbCredentials
): Effect.Effect<number, SystemError | GeneralError, Database> =>
  Effect.gen(function* () {
    const db = yield* Database;
    const tables = yield* db.listTables(credentials);
    if (tables.length === 0) {
      yield* Effect.logInfo(`Database '${credentials.name}' has no tables`);
      return 0;
    }
    yield* pipe(
      db.execute(credentials, buildDropTablesSql(tables)),
      Effect.mapError(
        (e) =>
          new SystemError({
            code: ErrorCode.GENERAL_ERROR,
            message: `Could not drop tables of '${credentials.name}': ${e.message}`,
            ...causeProps(e),
          })
      )
    );
    yield* logSuccess(`Dropped ${tables.length} table(s) from '${credentials.name}'`);
    return tables.length;
  });

const restoreFailed =
  (code: RestoreErrorCode, what: string, path: string) =>
  (detail: string, e?: unknown): RestoreError =>
    new RestoreError({ code, message: `${what} failed: ${detail}`, path, ...causeProps(e) });

const extractArchive = (
  archivePath: AbsolutePath,
  destDir: AbsolutePath,
  code: RestoreErrorCode,
  what: string
): Effect.Effect<void, RestoreError, Archiver> =>
  Effect.gen(function* () {
    const archiver = yield* Archiver;
    const failed = restoreFailed(code, what, archivePath);
    const result = yield* pipe(
      archiver.extract(archivePath, destDir),
      Effect.mapError((e) => failed(e.message, e))
    );
    if (result.exitCode !== 0) {
      return yield* Effect.fail(failed(describeFailure(result)));
    }
    yield* logSuccess(`${what} complete`);
  });

const restoreDatabase = (
  credentials: DbCredentials,
  dumpPath: AbsolutePath
): Effect.Effect<void, RestoreError, Database> =>
  Effect.gen(function* () {
    const db = yield* Database;
    const failed = restoreFailed(ErrorCode.RESTORE_DB_FAILED, "Database restore", dumpPath);
    const result = yield* pipe(
      db.restore(credentials, dumpPath),
      Effect.mapError((e) => failed(e.message, e))
    );
    if (result.exitCode !== 0) {
      return yield* Effect.fail(failed(describeFailure(result)));
    }
    yield* logSuccess(`Database '${credentials.name}' restored`);
  });

/** Confirmed, destructive part of a restore. */
const applySet = (
  settings: Settings,
  project: ProjectName,
  set: BackupSet,
  webRoot: AbsolutePath
): Effect.Effect<void, RestoreRunError, RestoreRunEnv> =>
  Effect.gen(function* () {
    const hasWeb = hasArtifact(set, "web");
    const hasMedia = hasArtifact(set, "media");
    const steps = yield* createStepCounter(4 + (hasWeb ? 1 : 0) + (hasMedia ? 1 : 0));

    yield* steps.next("Reading database credentials");
    const credentials = yield* credentialsFor(settings, project, set, webRoot);

    yield* steps.next(`Dropping all tables of '${credentials.name}'`);
    yield* dropAllTables(credentials);

    yield* steps.next(`Emptying web root ${webRoot}`);
    yield* emptyDirectory(webRoot);

    yield* steps.next("Restoring database");
    yield* restoreDatabase(credentials, pathJoin(set.dir, ARTIFACT_FILES.database));

    if (hasWeb) {
      yield* steps.next("Restoring web files");
      yield* extractArchive(
        pathJoin(set.dir, ARTIFACT_FILES.web),
        settings.projectRoot,
        ErrorCode.RESTORE_WEB_FAILED,
        "Web file restore"
      );
    } else {
      yield* Effect.logInfo("No web archive in this backup; skipping web files");
    }

    if (hasMedia) {
      yield* steps.next("Restoring media files");
      yield* extractArchive(
        pathJoin(set.dir, ARTIFACT_FILES.media),
        webRoot,
        ErrorCode.RESTORE_MEDIA_FAILED,
        "Media file restore"
      );
    } else {
      yield* Effect.logInfo("No media archive in this backup; skipping media files");
    }
  });

const restoreProject = (
  settings: Settings,
  project: ProjectName,
  presets: RestorePresets
): Effect.Effect<RunOutcome, RestoreRunError, RestoreRunEnv> =>
  Effect.gen(function* () {
    const baseDir = projectBackupDir(settings.backupRoot, project);
    if (!(yield* hasBackupDirectory(settings.backupRoot, project))) {
      return yield* Effect.fail(backupNotFound(`No backup directory for ${project}: ${baseDir}`, baseDir));
    }
    const sets = yield* listBackupSets(settings.backupRoot, project);
    if (sets.length === 0) {
      return yield* Effect.fail(backupNotFound(`No backups found in ${baseDir}`, baseDir));
    }

    const chosen = yield* selectBackupSet(sets, presets.backup);
    if (Option.isNone(chosen)) {
      yield* Effect.logWarning("No backup selected; restore cancelled");
      return RunOutcome.Cancelled({ reason: "no backup selected" });
    }
    const set = chosen.value;

    if (!hasArtifact(set, "database")) {
      const dump = pathJoin(set.dir, ARTIFACT_FILES.database);
      return yield* Effect.fail(backupNotFound(`Backup ${set.timestamp} has no database dump: ${dump}`, dump));
    }
    if (!set.complete) {
      yield* Effect.logWarning(`Backup ${set.timestamp} has no metadata; it may be incomplete`);
    }

    const webRoot = pathJoin(settings.projectRoot, project);
    if (!(yield* confirm(project, set, webRoot, presets.confirm))) {
      yield* Effect.logWarning("Restore not confirmed; nothing was changed");
      return RunOutcome.Cancelled({ reason: "not confirmed" });
    }

    yield* applySet(settings, project, set, webRoot);
    yield* logSuccess(`Restore of ${project} from ${set.timestamp} complete`);
    return RunOutcome.Completed({ project, setDir: set.dir });
  }).pipe(withProject(project));

export const runRestore = (
  settings: Settings,
  presets: RestorePresets
): Effect.Effect<RunOutcome, RestoreRunError, RestoreRunEnv> =>
  Effect.gen(function* () {
    yield* Effect.logInfo("Restore started");
    const project = yield* selectProject(settings.projectRoot, presets.project);
    if (Option.isNone(project)) {
      yield* Effect.logWarning("No project selected; restore cancelled");
      return RunOutcome.Cancelled({ reason: "no project selected" });
    }
    return yield* restoreProject(settings, project.value, presets);
  }).pipe(Effect.annotateLogs("operation", "restore"));
