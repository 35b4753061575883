// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Database credentials from a shop's PHP config file, either the live one
 * or the copy inside a backup set's web archive.
 */

import { FileSystem } from "@effect/platform";
import { Effect, pipe } from "effect";
import type { ProjectLayout } from "../config/schema";
import {
  ConfigError,
  ErrorCode,
  type GeneralError,
  SystemError,
  causeProps,
  errorMessage,
} from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { pathExists, readTextFile } from "../system/fs";
import { Archiver } from "../system/services/archiver";
import type { DbCredentials } from "./types";

type CredentialKey = "DB_HOST" | "DB_NAME" | "DB_USER" | "DB_PASS";

const FIELD_FOR_KEY: Readonly<Record<CredentialKey, keyof DbCredentials>> = {
  DB_HOST: "host",
  DB_NAME: "name",
  DB_USER: "user",
  DB_PASS: "password",
};

const CREDENTIAL_KEYS: readonly CredentialKey[] = ["DB_HOST", "DB_NAME", "DB_USER", "DB_PASS"];

const isCredentialKey = (s: string): s is CredentialKey =>
  CREDENTIAL_KEYS.some((k) => k === s);

/** `define('KEY', 'value')`; either quote style, value runs up to the next quote. */
const DEFINE_PATTERN = /define\(\s*["'](DB_HOST|DB_NAME|DB_USER|DB_PASS)["']\s*,\s*["']([^"']*)["']/g;

export type PartialCredentials = { readonly [K in keyof DbCredentials]?: string };

/** First definition of each key wins. */
export const parseCredentials = (content: string): PartialCredentials =>
  Array.from(content.matchAll(DEFINE_PATTERN)).reduce<PartialCredentials>((acc, match) => {
    const key = match[1];
    const value = match[2];
    if (key === undefined || value === undefined || !isCredentialKey(key)) {
      return acc;
    }
    const field = FIELD_FOR_KEY[key];
    return acc[field] === undefined ? { ...acc, [field]: value } : acc;
  }, {});

/** All four fields must be present and non-empty. */
export const validateCredentials = (
  partial: PartialCredentials,
  source: string
): Effect.Effect<DbCredentials, ConfigError> => {
  const missing = CREDENTIAL_KEYS.filter((key) => {
    const value = partial[FIELD_FOR_KEY[key]];
    return value === undefined || value === "";
  });
  const { host, name, user, password } = partial;
  return missing.length === 0 &&
    host !== undefined &&
    name !== undefined &&
    user !== undefined &&
    password !== undefined
    ? Effect.succeed({ host, name, user, password })
    : Effect.fail(
        new ConfigError({
          code: ErrorCode.GENERAL_ERROR,
          reason: "missing-credential",
          message: `Missing or empty ${missing.join(", ")} in ${source}`,
          path: source,
        })
      );
};

const readCredentialsFile = (
  filePath: string,
  source: string
): Effect.Effect<DbCredentials, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const exists = yield* pathExists(filePath);
    if (!exists) {
      return yield* Effect.fail(
        new ConfigError({
          code: ErrorCode.GENERAL_ERROR,
          reason: "config-not-found",
          message: `Configuration file not found: ${source}`,
          path: source,
        })
      );
    }
    const content = yield* readTextFile(filePath);
    return yield* validateCredentials(parseCredentials(content), source);
  });

/** `<projectDir>/<configFile>` on the live site. */
export const readLiveCredentials = (
  projectDir: AbsolutePath,
  layout: ProjectLayout
): Effect.Effect<DbCredentials, ConfigError | SystemError, FileSystem.FileSystem> => {
  const filePath = `${projectDir}/${layout.configFile}`;
  return readCredentialsFile(filePath, filePath);
};

/**
 * Extracts only `<project>/<configFile>` from the web archive into a scratch
 * directory, which is removed on every exit path.
 */
export const extractCredentialsFromArchive = (
  webArchive: string,
  project: string,
  layout: ProjectLayout
): Effect.Effect<
  DbCredentials,
  ConfigError | SystemError | GeneralError,
  FileSystem.FileSystem | Archiver
> =>
  Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const archiver = yield* Archiver;
      const member = `${project}/${layout.configFile}`;
      const source = `${webArchive}:${member}`;

      const scratch = yield* pipe(
        fs.makeTempDirectoryScoped({ prefix: "sitevault-cfg-" }),
        Effect.mapError(
          (e) =>
            new SystemError({
              code: ErrorCode.GENERAL_ERROR,
              message: `Cannot create scratch directory for ${source}: ${errorMessage(e)}`,
              ...causeProps(e),
            })
        )
      );

      const result = yield* archiver.extract(webArchive, scratch, [member]);
      if (result.exitCode !== 0) {
        const detail = result.stderr.trim();
        return yield* Effect.fail(
          new ConfigError({
            code: ErrorCode.GENERAL_ERROR,
            reason: "config-not-found",
            message: `Configuration file not found in backup: ${source}${detail ? ` (${detail})` : ""}`,
            path: webArchive,
          })
        );
      }

      return yield* readCredentialsFile(`${scratch}/${member}`, source);
    })
  );
