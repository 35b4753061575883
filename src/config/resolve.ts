// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Precedence: CLI flag, then environment, then config file (whose own
 * defaults stand in for absent keys).
 */

import { Effect, Option, pipe } from "effect";
import type { ConfigError } from "../lib/errors";
import { type AbsolutePath, decodeAbsolutePath } from "../lib/types";
import type { EnvConfig } from "./env";
import type { LogFormat, LogLevel } from "./field-values";
import type { Settings, SitevaultConfig } from "./schema";

export interface ConfigField<A> {
  readonly cli: Option.Option<A>;
  readonly env: Option.Option<A>;
  readonly toml: A;
}

export const resolve = <A>(field: ConfigField<A>): A =>
  pipe(
    field.cli,
    Option.orElse(() => field.env),
    Option.getOrElse(() => field.toml)
  );

/** Overrides taken from global and per-command flags. */
export interface CliOverrides {
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  readonly verbose: boolean;
  readonly keep: Option.Option<number>;
}

export const noCliOverrides: CliOverrides = {
  logLevel: Option.none(),
  logFormat: Option.none(),
  verbose: false,
  keep: Option.none(),
};

/** `~` and `~/x` expand against `home`; anything else is returned unchanged. */
export const expandHome = (p: string, home: string): string =>
  p === "~" ? home : p.startsWith("~/") ? `${home}${p.slice(1)}` : p;

/** `--verbose` and SITEVAULT_DEBUG force debug regardless of other sources. */
export const resolveLogLevel = (cli: CliOverrides, env: EnvConfig, toml: LogLevel): LogLevel =>
  cli.verbose || env.debug
    ? "debug"
    : resolve({ cli: cli.logLevel, env: env.logLevel, toml });

export const resolveSettings = (
  file: SitevaultConfig,
  env: EnvConfig,
  cli: CliOverrides
): Effect.Effect<Settings, ConfigError> =>
  Effect.gen(function* () {
    const absolute = (raw: string): Effect.Effect<AbsolutePath, ConfigError> =>
      decodeAbsolutePath(expandHome(raw, env.home));

    const projectRoot = yield* absolute(
      resolve({ cli: Option.none(), env: env.projectRoot, toml: file.paths.projectRoot })
    );
    const backupRoot = yield* absolute(
      resolve({ cli: Option.none(), env: env.backupRoot, toml: file.paths.backupRoot })
    );

    return {
      projectRoot,
      backupRoot,
      keep: resolve({ cli: cli.keep, env: env.keep, toml: file.retention.keep }),
      compressionLevel: file.archive.compressionLevel,
      compressor: file.archive.compressor,
      project: file.project,
      cache: file.cache,
      logging: {
        level: resolveLogLevel(cli, env, file.logging.level),
        format: resolve({ cli: cli.logFormat, env: env.logFormat, toml: file.logging.format }),
      },
    };
  });
