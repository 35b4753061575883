// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes settings resolution,
 * logger setup and error display to avoid duplication across commands.
 */

import { Command } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import { NodeContext } from "@effect/platform-node";
import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Either, Layer, Match, Option, pipe } from "effect";
import { runBackup } from "../backup/backup";
import { listBackups } from "../backup/listing";
import { runRestore } from "../backup/restore";
import { RunOutcome } from "../backup/types";
import { EnvConfigSpec } from "../config/env";
import { loadConfig } from "../config/loader";
import { resolveSettings } from "../config/resolve";
import type { Settings } from "../config/schema";
import { SitevaultLoggerLive } from "../lib/effect-logger";
import { ConfigError, ErrorCode, type SitevaultError } from "../lib/errors";
import { logFail } from "../lib/log";
import { TOOL_VERSION } from "../lib/version";
import { Archiver, ArchiverLive } from "../system/services/archiver";
import { Chooser, ChooserLive } from "../system/services/chooser";
import { Database, DatabaseLive } from "../system/services/database";
import {
  type GlobalOptions,
  backup,
  confirm,
  dryRun,
  globalOptions,
  keep,
  mergeGlobals,
  mode,
  project,
  toCliOverrides,
} from "./options";

type CommandEnv = FileSystem.FileSystem | Chooser | Database | Archiver;

/** Resolved runtime context for commands. */
interface CommandContext {
  readonly settings: Settings;
  readonly source: Option.Option<string>;
}

// Context resolution

/** Merges CLI args > env vars > config file (priority order). */
export const resolveContext = (
  globals: GlobalOptions,
  keepCount: Option.Option<number>
): Effect.Effect<CommandContext, SitevaultError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const env = yield* pipe(
      EnvConfigSpec,
      Effect.mapError(
        (e) =>
          new ConfigError({
            code: ErrorCode.GENERAL_ERROR,
            reason: "config-validation",
            message: `Invalid environment configuration: ${String(e)}`,
          })
      )
    );
    const { config, source } = yield* loadConfig(globals.config, env.home);
    const settings = yield* resolveSettings(config, env, toCliOverrides(globals, keepCount));
    return { settings, source };
  });

// Error display

/** Type guard for error display routing. Tagged errors carry exit codes; anything else is a defect. */
const isSitevaultError = (err: unknown): err is SitevaultError =>
  typeof err === "object" && err !== null && "_tag" in err && "code" in err && "message" in err;

const displayError = (err: unknown): Effect.Effect<void> =>
  isSitevaultError(err) ? logFail(err.message) : Effect.void;

const reportOutcome = (outcome: RunOutcome): Effect.Effect<void> =>
  pipe(
    Match.value(outcome),
    Match.tag("Completed", () => Effect.void),
    Match.tag("Planned", ({ setDir }) => Effect.logInfo(`Dry run finished; ${setDir} was not created`)),
    Match.tag("Cancelled", ({ reason }) => Effect.logInfo(`Nothing done (${reason})`)),
    Match.exhaustive
  );

// Command runner

/** Console settings used when the configuration itself cannot be resolved. */
const FALLBACK_LOGGING: Settings["logging"] = { level: "info", format: "pretty" };

/**
 * Settings are resolved before any logger is installed so that a single
 * console logger, configured once, serves the whole command.
 */
const runCommand = <E, R extends CommandEnv>(
  globals: GlobalOptions,
  keepCount: Option.Option<number>,
  handler: (settings: Settings) => Effect.Effect<void, E, R>
): Effect.Effect<void, E | SitevaultError, R | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const context = yield* Effect.either(resolveContext(globals, keepCount));
    const logging = Either.match(context, {
      onLeft: () => FALLBACK_LOGGING,
      onRight: ({ settings }) => settings.logging,
    });
    yield* pipe(
      Effect.gen(function* () {
        const { settings, source } = yield* context;
        yield* Effect.logDebug(
          Option.match(source, {
            onNone: () => "No configuration file found; using defaults",
            onSome: (p) => `Configuration loaded from ${p}`,
          })
        );
        yield* handler(settings);
      }),
      Effect.tapError(displayError),
      Effect.provide(SitevaultLoggerLive(logging))
    );
  });

const MENU_ENTRIES = ["Backup", "Restore", "Exit"] as const;

/** No subcommand: ask what to do. A cancelled menu exits cleanly. */
const interactiveMenu = (settings: Settings): Effect.Effect<void, SitevaultError, CommandEnv> =>
  Effect.gen(function* () {
    const chooser = yield* Chooser;
    const picked = pipe(
      yield* chooser.choose(`sitevault ${TOOL_VERSION}: what do you want to do?`, MENU_ENTRIES),
      Option.flatMap((i) => Arr.get(MENU_ENTRIES, i)),
      Option.getOrElse((): (typeof MENU_ENTRIES)[number] => "Exit")
    );
    yield* pipe(
      Match.value(picked),
      Match.when("Backup", () =>
        Effect.flatMap(
          runBackup(settings, { project: Option.none(), mode: Option.none(), dryRun: false }),
          reportOutcome
        )
      ),
      Match.when("Restore", () =>
        Effect.flatMap(
          runRestore(settings, {
            project: Option.none(),
            backup: Option.none(),
            confirm: Option.none(),
          }),
          reportOutcome
        )
      ),
      Match.when("Exit", () => Effect.logDebug("Exit selected")),
      Match.exhaustive
    );
  });

// Root and subcommand definitions

const root = Command.make("sitevault", globalOptions, (args) =>
  runCommand(args, Option.none(), interactiveMenu)
);

const backupCmd = Command.make(
  "backup",
  { ...globalOptions, project, mode, keep, dryRun },
  (args) =>
    Effect.flatMap(root, (parent) =>
      runCommand(mergeGlobals(parent, args), args.keep, (settings) =>
        Effect.flatMap(
          runBackup(settings, { project: args.project, mode: args.mode, dryRun: args.dryRun }),
          reportOutcome
        )
      )
    )
).pipe(Command.withDescription("Back up a project's database and files"));

const restoreCmd = Command.make(
  "restore",
  { ...globalOptions, project, backup, confirm },
  (args) =>
    Effect.flatMap(root, (parent) =>
      runCommand(mergeGlobals(parent, args), Option.none(), (settings) =>
        Effect.flatMap(
          runRestore(settings, { project: args.project, backup: args.backup, confirm: args.confirm }),
          reportOutcome
        )
      )
    )
).pipe(Command.withDescription("Restore a project from a backup set (destructive)"));

const listCmd = Command.make("list", { ...globalOptions, project }, (args) =>
  Effect.flatMap(root, (parent) =>
    runCommand(mergeGlobals(parent, args), Option.none(), (settings) =>
      listBackups(settings, args.project)
    )
  )
).pipe(Command.withDescription("List backup sets with their status and metadata"));

const sitevault = root.pipe(
  Command.withDescription("Backup and restore for web shop projects"),
  Command.withSubcommands([backupCmd, restoreCmd, listCmd])
);

export const cli: (
  args: readonly string[]
) => Effect.Effect<void, unknown, CliApp.Environment | Chooser | Database | Archiver> = Command.run(
  sitevault,
  {
    name: "sitevault",
    version: TOOL_VERSION,
  }
);

const MainLive = Layer.mergeAll(DatabaseLive, ArchiverLive, ChooserLive).pipe(
  Layer.provideMerge(NodeContext.layer)
);

/** `argv` as in process.argv. */
export const program = (argv: readonly string[]): Effect.Effect<void, unknown> =>
  pipe(cli(argv), Effect.provide(MainLive));
