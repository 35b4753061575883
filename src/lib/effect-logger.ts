// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Custom logger because Effect's default lacks step progress indicators,
 * styled messages (success checkmarks, failure X marks) and the per-run
 * transcript file that backup sets carry.
 */

import { type FileSystem, PlatformLogger } from "@effect/platform";
import { Cause, Effect, HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel as SitevaultLogLevel } from "../config/field-values";
import { ErrorCode, SystemError } from "./errors";

type LogStyleTag = "step" | "success" | "fail";
type ColorName = "red" | "green" | "yellow" | "blue" | "cyan" | "gray" | "white";

/** Records annotated with the transcript channel never reach the console. */
const CHANNEL_KEY = "channel";
const TRANSCRIPT_CHANNEL = "transcript";

/** Formatting-only annotations filtered from JSON to keep logs clean for aggregation. */
const INTERNAL_KEYS: ReadonlySet<string> = new Set(["logStyle", "stepNumber", "stepTotal", CHANNEL_KEY]);

const ANSI_COLORS: Readonly<Record<ColorName, string>> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  white: "\x1b[37m",
};

const toEffectLogLevel = (level: SitevaultLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

/** NO_COLOR wins; otherwise color only when stdout is a terminal. */
export const detectColorSupport = (): boolean =>
  process.env["NO_COLOR"] === undefined && process.stdout.isTTY === true;

/** Extracts typed string annotation, returning None if absent or wrong type. */
const getStringAnnotation = (
  annotations: HashMap.HashMap<string, unknown>,
  key: string
): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v): v is string => typeof v === "string")
  );

const getStyle = (annotations: HashMap.HashMap<string, unknown>): Option.Option<LogStyleTag> =>
  pipe(
    getStringAnnotation(annotations, "logStyle"),
    Option.filter((v): v is LogStyleTag => v === "step" || v === "success" || v === "fail")
  );

const colorize = (color: ColorName, text: string, useColor: boolean): string =>
  useColor ? `${ANSI_COLORS[color]}${text}\x1b[0m` : text;

const bold = (text: string, useColor: boolean): string =>
  useColor ? `\x1b[1m${text}\x1b[0m` : text;

const LEVEL_COLORS: Readonly<Record<string, ColorName>> = {
  DEBUG: "gray",
  INFO: "blue",
  WARN: "yellow",
  ERROR: "red",
};

const pad2 = (n: number): string => String(n).padStart(2, "0");

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export const formatLogTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
  `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;

/** Effect passes log messages as an array when several values are logged at once. */
export const messageToString = (message: unknown): string =>
  Array.isArray(message) ? message.map((m) => String(m)).join(" ") : String(message);

const formatStepMessage = (
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  useColor: boolean
): string => {
  const step = pipe(
    getStringAnnotation(annotations, "stepNumber"),
    Option.getOrElse(() => "?")
  );
  const total = pipe(
    getStringAnnotation(annotations, "stepTotal"),
    Option.getOrElse(() => "?")
  );
  const prefix = bold(`[${step}/${total}]`, useColor);
  const arrow = colorize("cyan", "→", useColor);
  return `${prefix} ${arrow} ${message}`;
};

const formatStyledMessage = (
  style: LogStyleTag,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  useColor: boolean
): string =>
  pipe(
    Match.value(style),
    Match.when("step", () => formatStepMessage(message, annotations, useColor)),
    Match.when("success", () => `${colorize("green", "✓", useColor)} ${message}`),
    Match.when("fail", () => `${colorize("red", "✗", useColor)} ${message}`),
    Match.exhaustive
  );

const formatCause = (cause: Cause.Cause<unknown>): string =>
  Cause.isEmpty(cause) ? "" : `\n${Cause.pretty(cause)}`;

/**
 * One pretty log line: `[timestamp] LEVEL [project] message`.
 * Styled records keep the timestamp but replace the level with their marker.
 */
export const formatPretty = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  cause: Cause.Cause<unknown>,
  date: Date,
  useColor: boolean
): string => {
  const stamp = colorize("gray", `[${formatLogTimestamp(date)}]`, useColor);
  const body = pipe(
    getStyle(annotations),
    Option.match({
      onNone: (): string => {
        const levelColor = pipe(
          Option.fromNullable(LEVEL_COLORS[logLevel.label]),
          Option.getOrElse((): ColorName => "white")
        );
        const levelStr = colorize(levelColor, logLevel.label.padEnd(5), useColor);
        const projectStr = pipe(
          getStringAnnotation(annotations, "project"),
          Option.match({
            onNone: (): string => "",
            onSome: (p): string => `${colorize("cyan", `[${p}]`, useColor)} `,
          })
        );
        return `${levelStr} ${projectStr}${message}${formatCause(cause)}`;
      },
      onSome: (style): string => formatStyledMessage(style, message, annotations, useColor),
    })
  );
  return `${stamp} ${body}`;
};

const collectExternalAnnotations = (
  annotations: HashMap.HashMap<string, unknown>
): Record<string, unknown> =>
  Object.fromEntries(
    Array.from(HashMap.toEntries(annotations)).filter(([k]) => !INTERNAL_KEYS.has(k))
  );

export const formatJson = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  date: Date
): string =>
  JSON.stringify({
    timestamp: date.toISOString(),
    level: logLevel.label.toLowerCase(),
    message,
    ...collectExternalAnnotations(annotations),
  });

const isStderrOutput = (logLevel: LogLevel.LogLevel, style: Option.Option<LogStyleTag>): boolean =>
  logLevel.label === "ERROR" ||
  pipe(
    style,
    Option.map((s) => s === "fail"),
    Option.getOrElse(() => false)
  );

/** Routes errors and failures to stderr, everything else to stdout. */
const ConsoleLogger = (format: LogFormat, useColor: boolean): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    if (Option.contains(getStringAnnotation(annotations, CHANNEL_KEY), TRANSCRIPT_CHANNEL)) {
      return;
    }
    const msg = messageToString(message);
    const style = getStyle(annotations);

    const output = pipe(
      Match.value(format),
      Match.when("json", () => formatJson(logLevel, msg, annotations, date)),
      Match.when("pretty", () => formatPretty(logLevel, msg, annotations, cause, date, useColor)),
      Match.exhaustive
    );

    const stream = isStderrOutput(logLevel, style) ? process.stderr : process.stdout;
    stream.write(`${output}\n`);
  });

/**
 * The configured level filters the console only; the global minimum is
 * lowered to Debug so other loggers (the transcript) apply their own level.
 */
export const SitevaultLoggerLive = (options: {
  readonly level: SitevaultLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
}): Layer.Layer<never> => {
  const useColor = options.color ?? detectColorSupport();
  const minimum = toEffectLogLevel(options.level);
  return Layer.merge(
    Logger.replace(
      Logger.defaultLogger,
      Logger.filterLogLevel(ConsoleLogger(options.format, useColor), (level) =>
        LogLevel.greaterThanEqual(level, minimum)
      )
    ),
    Logger.minimumLogLevel(LogLevel.Debug)
  );
};

/** Everything from Info up reaches backup.log, whatever the console shows. */
const TRANSCRIPT_LEVEL = LogLevel.Info;

/** Plain lines (no ANSI) so the file reads the same in any pager. */
const TranscriptFormatter: Logger.Logger<unknown, string> = Logger.make(
  ({ logLevel, message, cause, annotations, date }) =>
    formatPretty(logLevel, messageToString(message), annotations, cause, date, false)
);

/** Appends every record of the wrapped effect to `filePath`, alongside the console. */
export const TranscriptLoggerLive = (
  filePath: string
): Layer.Layer<never, SystemError, FileSystem.FileSystem> =>
  Logger.addScoped(
    pipe(
      PlatformLogger.toFile(TranscriptFormatter, filePath, { flag: "a" }),
      Effect.map((logger) =>
        Logger.filterLogLevel(logger, (level) => LogLevel.greaterThanEqual(level, TRANSCRIPT_LEVEL))
      ),
      Effect.mapError(
        (e) =>
          new SystemError({
            code: ErrorCode.GENERAL_ERROR,
            message: `Cannot open transcript ${filePath}: ${e.message}`,
            path: filePath,
          })
      )
    )
  );

/**
 * One ERROR record for the transcript only.
 * For failures the entry point reports on the console itself.
 */
export const recordTranscriptFailure = (message: string): Effect.Effect<void> =>
  Effect.logError(message).pipe(Effect.annotateLogs(CHANNEL_KEY, TRANSCRIPT_CHANNEL));
