// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions. Sharing these ensures consistent naming
 * and descriptions across commands, and enables type-safe composition.
 */

import { Options as O } from "@effect/cli";
import type { Options } from "@effect/cli/Options";
import { Option } from "effect";
import {
  BACKUP_MODE_VALUES,
  type BackupMode,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "../config/field-values";
import type { CliOverrides } from "../config/resolve";

// Global options (on the root command and spread into every subcommand)

export const globalOptions: {
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly format: Options<Option.Option<LogFormat>>;
  readonly config: Options<Option.Option<string>>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Log output format"),
    O.optional
  ),
  config: O.text("config").pipe(
    O.withAlias("c"),
    O.withDescription("Path to sitevault.toml"),
    O.optional
  ),
};

// Per-command options

export const project: Options<Option.Option<string>> = O.text("project").pipe(
  O.withAlias("p"),
  O.withDescription("Project directory name under the project root (asked for when omitted)"),
  O.optional
);

export const mode: Options<Option.Option<BackupMode>> = O.choice("mode", BACKUP_MODE_VALUES).pipe(
  O.withDescription("What to archive besides the database (asked for when omitted)"),
  O.optional
);

export const keep: Options<Option.Option<number>> = O.integer("keep").pipe(
  O.withDescription("Number of complete backup sets to keep"),
  O.optional
);

export const dryRun: Options<boolean> = O.boolean("dry-run").pipe(
  O.withDescription("Show what would be done without doing it")
);

export const backup: Options<Option.Option<string>> = O.text("backup").pipe(
  O.withAlias("b"),
  O.withDescription("Backup set timestamp, YYYYMMDD_HHMMSS (asked for when omitted)"),
  O.optional
);

export const confirm: Options<Option.Option<string>> = O.text("confirm").pipe(
  O.withDescription("Confirmation word for scripted restores"),
  O.optional
);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly config: Option.Option<string>;
}

/**
 * Globals given after the subcommand name win over those given before it.
 */
export const mergeGlobals = (root: GlobalOptions, command: GlobalOptions): GlobalOptions => ({
  verbose: root.verbose || command.verbose,
  logLevel: Option.orElse(command.logLevel, () => root.logLevel),
  format: Option.orElse(command.format, () => root.format),
  config: Option.orElse(command.config, () => root.config),
});

export const toCliOverrides = (
  globals: GlobalOptions,
  keepCount: Option.Option<number>
): CliOverrides => ({
  logLevel: globals.logLevel,
  logFormat: globals.format,
  verbose: globals.verbose,
  keep: keepCount,
});
