// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types prevent accidental mixing of same-underlying-type values.
 * A project name and a backup timestamp are both strings, but the compiler
 * rejects using one where the other is expected.
 */

import { join } from "node:path";
import { type Brand, Effect, ParseResult, Schema, pipe } from "effect";
import { ConfigError, ErrorCode } from "./errors";

export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;
export type ProjectName = string & Brand.Brand<"ProjectName">;
export type BackupTimestamp = string & Brand.Brand<"BackupTimestamp">;

/** `YYYYMMDD_HHMMSS`; fixed width, so lexicographic order is chronological. */
const BACKUP_TIMESTAMP_PATTERN = /^\d{8}_\d{6}$/;

const absolutePathMsg = (): string => "Path must be absolute (start with /)";
const projectNameMsg = (): string =>
  "Project name must be a single directory name (no '/', not '.' or '..')";
const timestampMsg = (): string => "Backup timestamp must have the form YYYYMMDD_HHMMSS";

export const isValidProjectName = (s: string): boolean =>
  s.length > 0 && !s.includes("/") && !s.includes("\x00") && s !== "." && s !== "..";

export const isBackupTimestamp = (s: string): s is BackupTimestamp =>
  BACKUP_TIMESTAMP_PATTERN.test(s);

export const AbsolutePathSchema: Schema.BrandSchema<AbsolutePath, string, never> =
  Schema.String.pipe(
    Schema.filter((s): boolean => s.startsWith("/"), { message: absolutePathMsg }),
    Schema.brand("AbsolutePath")
  );

export const ProjectNameSchema: Schema.BrandSchema<ProjectName, string, never> = Schema.String.pipe(
  Schema.filter(isValidProjectName, { message: projectNameMsg }),
  Schema.brand("ProjectName")
);

export const BackupTimestampSchema: Schema.BrandSchema<BackupTimestamp, string, never> =
  Schema.String.pipe(
    Schema.filter(isBackupTimestamp, { message: timestampMsg }),
    Schema.brand("BackupTimestamp")
  );

const decodeBranded =
  <A>(schema: Schema.Schema<A, string, never>, label: string) =>
  (value: string): Effect.Effect<A, ConfigError> =>
    pipe(
      Schema.decodeUnknown(schema)(value),
      Effect.mapError(
        (e): ConfigError =>
          new ConfigError({
            code: ErrorCode.GENERAL_ERROR,
            reason: "config-validation",
            message: `Invalid ${label} '${value}': ${ParseResult.TreeFormatter.formatErrorSync(e)}`,
          })
      )
    );

export const decodeAbsolutePath: (value: string) => Effect.Effect<AbsolutePath, ConfigError> =
  decodeBranded(AbsolutePathSchema, "path");

export const decodeProjectName: (value: string) => Effect.Effect<ProjectName, ConfigError> =
  decodeBranded(ProjectNameSchema, "project name");

export const decodeBackupTimestamp: (value: string) => Effect.Effect<BackupTimestamp, ConfigError> =
  decodeBranded(BackupTimestampSchema, "backup timestamp");

/**
 * Create an AbsolutePath from a literal known to be absolute.
 * Throws on relative input; only for constants and test fixtures.
 */
export const path = (p: string): AbsolutePath => {
  if (!p.startsWith("/")) {
    throw new Error(`Expected absolute path, got: ${p}`);
  }
  return p as AbsolutePath;
};

/** Join segments onto an absolute base; the result stays absolute. */
export const pathJoin = (base: AbsolutePath, ...segments: readonly string[]): AbsolutePath =>
  join(base, ...segments) as AbsolutePath;
