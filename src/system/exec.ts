// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Command execution via @effect/platform Command with structured argument
 * arrays. Nothing goes through a shell: redirections and pipes are built from
 * process streams so each process keeps its own exit status.
 */

import { Command, FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Stream, pipe } from "effect";
import { ErrorCode, GeneralError, SystemError, causeProps, errorMessage } from "../lib/errors";

export interface ExecOptions {
  readonly env?: Readonly<Record<string, string>>;
  readonly cwd?: string;
  readonly stdin?: string;
}

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/** Exit status of a process whose stdout went somewhere other than memory. */
export interface StreamedResult {
  readonly exitCode: number;
  readonly stderr: string;
}

/** Exit status of both stages of a `producer | consumer > dest` pipeline. */
export interface PipelineResult {
  readonly producer: StreamedResult;
  readonly consumer: StreamedResult;
}

/** Internalizes NodeContext.layer so callers don't need the R type parameter. */
const withExecutor = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Effect.Effect<A, E> => effect.pipe(Effect.provide(NodeContext.layer));

const execError = (command: readonly string[], e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.GENERAL_ERROR,
    message: `Failed to execute: ${command.join(" ")}: ${errorMessage(e)}`,
    ...causeProps(e),
  });

const emptyCommandError = (): GeneralError =>
  new GeneralError({
    code: ErrorCode.GENERAL_ERROR,
    message: "Command array cannot be empty",
  });

const buildCommand = (
  command: readonly string[],
  options: ExecOptions
): Effect.Effect<Command.Command, GeneralError> => {
  const [cmd, ...args] = command;
  if (cmd === undefined || cmd === "") {
    return Effect.fail(emptyCommandError());
  }
  return Effect.succeed(
    pipe(
      Command.make(cmd, ...args),
      (c) => (options.env !== undefined ? Command.env(c, options.env) : c),
      (c) => (options.cwd !== undefined ? Command.workingDirectory(c, options.cwd) : c),
      (c) => (options.stdin !== undefined ? Command.feed(c, options.stdin) : c)
    )
  );
};

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

/** Runs a command to completion; a non-zero exit is a result, not an error. */
export const exec = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const configured = yield* buildCommand(command, options);

    return yield* withExecutor(
      Effect.gen(function* () {
        const process = yield* Command.start(configured);
        const [exitCode, stdout, stderr] = yield* Effect.all(
          [process.exitCode, streamToString(process.stdout), streamToString(process.stderr)],
          { concurrency: "unbounded" }
        );
        return { exitCode, stdout, stderr };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(command, e)));
  });

/** Fails if exit code is non-zero. */
export const execSuccess = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  pipe(
    exec(command, options),
    Effect.filterOrFail(
      (result): result is ExecResult => result.exitCode === 0,
      (result) => {
        const stderr = result.stderr.trim();
        return new SystemError({
          code: ErrorCode.GENERAL_ERROR,
          message: `Command failed with exit code ${result.exitCode}: ${command.join(" ")}${stderr ? `\n${stderr}` : ""}`,
        });
      }
    )
  );

/** `command > dest`: stdout is streamed into the file, never buffered. */
export const execToFile = (
  command: readonly string[],
  dest: string,
  options: ExecOptions = {}
): Effect.Effect<StreamedResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const configured = yield* buildCommand(command, options);

    return yield* withExecutor(
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const process = yield* Command.start(configured);
        const [exitCode, , stderr] = yield* Effect.all(
          [
            process.exitCode,
            Stream.run(process.stdout, fs.sink(dest)),
            streamToString(process.stderr),
          ],
          { concurrency: "unbounded" }
        );
        return { exitCode, stderr };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(command, e)));
  });

/** `command < source`: the file is streamed into stdin. */
export const execFromFile = (
  command: readonly string[],
  source: string,
  options: Omit<ExecOptions, "stdin"> = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const base = yield* buildCommand(command, options);

    return yield* withExecutor(
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const process = yield* Command.start(Command.stdin(base, fs.stream(source)));
        const [exitCode, stdout, stderr] = yield* Effect.all(
          [process.exitCode, streamToString(process.stdout), streamToString(process.stderr)],
          { concurrency: "unbounded" }
        );
        return { exitCode, stdout, stderr };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(command, e)));
  });

/**
 * `producer | consumer > dest` with the exit status of BOTH processes.
 * A shell pipeline only reports its last stage, which hides a producer
 * failure behind a consumer that merely saw EOF.
 */
export const execPipeline = (
  producer: readonly string[],
  consumer: readonly string[],
  dest: string,
  options: Omit<ExecOptions, "stdin"> = {}
): Effect.Effect<PipelineResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const upstreamCommand = yield* buildCommand(producer, options);
    const downstreamBase = yield* buildCommand(consumer, options);
    const label = [...producer, "|", ...consumer];

    return yield* withExecutor(
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const upstream = yield* Command.start(upstreamCommand);
        const downstream = yield* Command.start(Command.stdin(downstreamBase, upstream.stdout));

        const [producerExit, producerStderr, consumerExit, , consumerStderr] = yield* Effect.all(
          [
            upstream.exitCode,
            streamToString(upstream.stderr),
            downstream.exitCode,
            Stream.run(downstream.stdout, fs.sink(dest)),
            streamToString(downstream.stderr),
          ],
          { concurrency: "unbounded" }
        );

        return {
          producer: { exitCode: producerExit, stderr: producerStderr },
          consumer: { exitCode: consumerExit, stderr: consumerStderr },
        };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(label, e)));
  });

/** Logical OR of stage failures: any non-zero stage fails the pipeline. */
export const pipelineSucceeded = (result: PipelineResult): boolean =>
  result.producer.exitCode === 0 && result.consumer.exitCode === 0;

/** First non-empty stderr of the failed stages, for error messages. */
export const pipelineFailureDetail = (result: PipelineResult): string =>
  [
    result.producer.exitCode !== 0
      ? `producer exited ${result.producer.exitCode}${result.producer.stderr.trim() ? `: ${result.producer.stderr.trim()}` : ""}`
      : "",
    result.consumer.exitCode !== 0
      ? `consumer exited ${result.consumer.exitCode}${result.consumer.stderr.trim() ? `: ${result.consumer.stderr.trim()}` : ""}`
      : "",
  ]
    .filter((s) => s.length > 0)
    .join("; ");

/** Compact description of a finished command for error messages. */
export const describeFailure = (result: StreamedResult): string => {
  const stderr = result.stderr.trim();
  return `exit code ${result.exitCode}${stderr ? `: ${stderr}` : ""}`;
};
