// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based overrides.
 * All exports are pure Config values; they are only read at the CLI boundary.
 * Every variable lives under the SITEVAULT_ namespace except HOME.
 */

import { Config, ConfigProvider, type Option } from "effect";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, type LogFormat, type LogLevel } from "./field-values";

export interface EnvConfig {
  readonly home: string;
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  readonly debug: boolean;
  readonly projectRoot: Option.Option<string>;
  readonly backupRoot: Option.Option<string>;
  readonly keep: Option.Option<number>;
}

/** Falls back to /root, as in minimal containers. */
export const HomeConfig: Config.Config<string> = Config.string("HOME").pipe(
  Config.withDefault("/root")
);

const namespaced = <A>(config: Config.Config<A>): Config.Config<A> =>
  Config.nested(config, "SITEVAULT");

export const LogLevelConfig: Config.Config<Option.Option<LogLevel>> = namespaced(
  Config.option(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL"))
);

export const LogFormatConfig: Config.Config<Option.Option<LogFormat>> = namespaced(
  Config.option(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT"))
);

/** When true, forces log level to debug. */
export const DebugModeConfig: Config.Config<boolean> = namespaced(
  Config.boolean("DEBUG").pipe(Config.withDefault(false))
);

export const ProjectRootConfig: Config.Config<Option.Option<string>> = namespaced(
  Config.option(Config.string("PROJECT_ROOT"))
);

export const BackupRootConfig: Config.Config<Option.Option<string>> = namespaced(
  Config.option(Config.string("BACKUP_ROOT"))
);

export const KeepConfig: Config.Config<Option.Option<number>> = namespaced(
  Config.option(
    Config.integer("KEEP").pipe(
      Config.validate({ message: "must be a non-negative integer", validation: (n) => n >= 0 })
    )
  )
);

export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all({
  home: HomeConfig,
  logLevel: LogLevelConfig,
  logFormat: LogFormatConfig,
  debug: DebugModeConfig,
  projectRoot: ProjectRootConfig,
  backupRoot: BackupRootConfig,
  keep: KeepConfig,
});

/**
 * ConfigProvider over a fixed variable map, for tests.
 *
 * @example
 * Effect.withConfigProvider(EnvConfigSpec, envProvider({ SITEVAULT_KEEP: "5" }))
 */
export const envProvider = (
  vars: Readonly<Record<string, string>>
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(new Map(Object.entries(vars)), { pathDelim: "_" });
