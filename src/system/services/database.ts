// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Database service using Context.Tag pattern.
 * Live layer drives the mysqldump / mysql clients. The password reaches
 * them through a 0600 option file that exists only for one invocation.
 */

import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Context, Effect, Layer, pipe } from "effect";
import type { DbCredentials } from "../../backup/types";
import { ErrorCode, type GeneralError, SystemError, causeProps, errorMessage } from "../../lib/errors";
import {
  type ExecResult,
  type StreamedResult,
  execFromFile,
  execSuccess,
  execToFile,
} from "../exec";

export interface DatabaseService {
  /** `mysqldump <db> > destPath` */
  readonly dump: (
    credentials: DbCredentials,
    destPath: string
  ) => Effect.Effect<StreamedResult, SystemError | GeneralError>;
  readonly listTables: (
    credentials: DbCredentials
  ) => Effect.Effect<readonly string[], SystemError | GeneralError>;
  /** Runs one statement batch; non-zero exit fails. */
  readonly execute: (
    credentials: DbCredentials,
    sql: string
  ) => Effect.Effect<void, SystemError | GeneralError>;
  /** `mysql <db> < sourcePath` */
  readonly restore: (
    credentials: DbCredentials,
    sourcePath: string
  ) => Effect.Effect<ExecResult, SystemError | GeneralError>;
}

export interface Database {
  readonly _tag: "Database";
}

export const Database: Context.Tag<Database, DatabaseService> = Context.GenericTag<
  Database,
  DatabaseService
>("sitevault/Database");

/** Option file values are double-quoted; backslash and quote are escaped. */
const quoteOptionValue = (value: string): string =>
  `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;

export const renderOptionFile = (credentials: DbCredentials): string =>
  [
    "[client]",
    `host=${quoteOptionValue(credentials.host)}`,
    `user=${quoteOptionValue(credentials.user)}`,
    `password=${quoteOptionValue(credentials.password)}`,
    "",
  ].join("\n");

/** Identifier quoting: wrap in backticks, double any embedded backtick. */
export const quoteIdentifier = (name: string): string => `\`${name.replace(/`/g, "``")}\``;

/** One batch dropping every table with referential checks off. */
export const buildDropTablesSql = (tables: readonly string[]): string =>
  [
    "SET FOREIGN_KEY_CHECKS=0;",
    ...tables.map((t) => `DROP TABLE IF EXISTS ${quoteIdentifier(t)};`),
    "SET FOREIGN_KEY_CHECKS=1;",
  ].join(" ");

/** `SHOW TABLES` in batch mode prints one name per line. */
export const parseTableList = (stdout: string): readonly string[] =>
  stdout
    .split("\n")
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);

/**
 * Runs `use` with the path of a freshly written option file.
 * The file is removed when `use` completes, fails or is interrupted.
 */
const withOptionFile = <A>(
  credentials: DbCredentials,
  use: (optionFile: string) => Effect.Effect<A, SystemError | GeneralError>
): Effect.Effect<A, SystemError | GeneralError> =>
  pipe(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const file = yield* fs.makeTempFileScoped({ prefix: "sitevault-my-" });
      yield* fs.writeFileString(file, renderOptionFile(credentials), { mode: 0o600 });
      yield* fs.chmod(file, 0o600);
      return file;
    }),
    Effect.mapError(
      (e) =>
        new SystemError({
          code: ErrorCode.GENERAL_ERROR,
          message: `Failed to write database option file: ${errorMessage(e)}`,
          ...causeProps(e),
        })
    ),
    Effect.flatMap(use),
    Effect.scoped,
    Effect.provide(NodeContext.layer)
  );

const clientArgs = (optionFile: string): readonly string[] => [
  `--defaults-extra-file=${optionFile}`,
];

export const DatabaseLive: Layer.Layer<Database> = Layer.succeed(Database, {
  dump: (credentials, destPath) =>
    withOptionFile(credentials, (f) =>
      execToFile(["mysqldump", ...clientArgs(f), credentials.name], destPath)
    ),

  listTables: (credentials) =>
    withOptionFile(credentials, (f) =>
      pipe(
        execSuccess(["mysql", ...clientArgs(f), "-N", "-B", "-e", "SHOW TABLES", credentials.name]),
        Effect.map((result) => parseTableList(result.stdout))
      )
    ),

  execute: (credentials, sql) =>
    withOptionFile(credentials, (f) =>
      pipe(execSuccess(["mysql", ...clientArgs(f), credentials.name, "-e", sql]), Effect.asVoid)
    ),

  restore: (credentials, sourcePath) =>
    withOptionFile(credentials, (f) =>
      execFromFile(["mysql", ...clientArgs(f), credentials.name], sourcePath)
    ),
});

