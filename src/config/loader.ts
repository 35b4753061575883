// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML configuration loading with fail-fast validation. Files are
 * parsed and validated in a single pass; syntax errors and schema
 * violations are reported with file path context. Without an explicit
 * path the default locations are searched in order and a missing file
 * means built-in defaults, but an explicit path must exist.
 */

import type { FileSystem } from "@effect/platform";
import { parse as parseToml } from "smol-toml";
import { Effect, Option, pipe } from "effect";
import { ConfigError, ErrorCode, type SystemError, causeProps, errorMessage } from "../lib/errors";
import { pathExists, readTextFile } from "../system/fs";
import { type SitevaultConfig, sitevaultConfigSchema } from "./schema";

/** Flattens zod issues into `path: message` lines. */
const formatIssues = (issues: readonly { path: (string | number)[]; message: string }[]): string =>
  issues.map((i) => `  ${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`).join("\n");

/** Parse and validate TOML text; `source` names the file in error messages. */
export const parseConfig = (
  content: string,
  source: string
): Effect.Effect<SitevaultConfig, ConfigError> =>
  Effect.gen(function* () {
    const parsed = yield* Effect.try({
      try: (): unknown => parseToml(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.GENERAL_ERROR,
          reason: "config-parse",
          message: `Failed to parse TOML in ${source}: ${errorMessage(e)}`,
          path: source,
          ...causeProps(e),
        }),
    });

    const result = sitevaultConfigSchema.safeParse(parsed);
    return yield* result.success
      ? Effect.succeed(result.data)
      : Effect.fail(
          new ConfigError({
            code: ErrorCode.GENERAL_ERROR,
            reason: "config-validation",
            message: `Invalid configuration in ${source}:\n${formatIssues(result.error.issues)}`,
            path: source,
          })
        );
  });

export const loadConfigFile = (
  filePath: string
): Effect.Effect<SitevaultConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const exists = yield* pathExists(filePath);
    if (!exists) {
      return yield* Effect.fail(
        new ConfigError({
          code: ErrorCode.GENERAL_ERROR,
          reason: "config-not-found",
          message: `Configuration file not found: ${filePath}`,
          path: filePath,
        })
      );
    }
    const content = yield* readTextFile(filePath);
    return yield* parseConfig(content, filePath);
  });

/** Search order when no explicit path is given. */
export const defaultConfigPaths = (home: string): readonly string[] => [
  `${home}/.config/sitevault/sitevault.toml`,
  "/etc/sitevault/sitevault.toml",
  "./sitevault.toml",
];

/** All-defaults configuration, used when no file is found. */
export const defaultConfig = (): SitevaultConfig => sitevaultConfigSchema.parse({});

/**
 * Explicit path: fail on any error. Otherwise the first existing default
 * path is loaded (and its errors reported); none existing yields defaults.
 */
export const loadConfig = (
  explicitPath: Option.Option<string>,
  home: string
): Effect.Effect<
  { readonly config: SitevaultConfig; readonly source: Option.Option<string> },
  ConfigError | SystemError,
  FileSystem.FileSystem
> =>
  pipe(
    explicitPath,
    Option.match({
      onSome: (p) =>
        Effect.map(loadConfigFile(p), (config) => ({ config, source: Option.some(p) })),
      onNone: () =>
        Effect.gen(function* () {
          const found = yield* Effect.findFirst(defaultConfigPaths(home), pathExists);
          return yield* Option.match(found, {
            onNone: () => Effect.succeed({ config: defaultConfig(), source: Option.none<string>() }),
            onSome: (p) =>
              Effect.map(loadConfigFile(p), (config) => ({ config, source: Option.some(p) })),
          });
        }),
    })
  );
