// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem operations over @effect/platform FileSystem.
 * Platform errors are mapped to SystemError carrying the offending path.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import { ErrorCode, SystemError, causeProps, errorMessage } from "../lib/errors";

const fsError =
  (action: string, path: string) =>
  (e: unknown): SystemError =>
    new SystemError({
      code: ErrorCode.GENERAL_ERROR,
      message: `Failed to ${action} ${path}: ${errorMessage(e)}`,
      path,
      ...causeProps(e),
    });

/** Never fails; an unreadable path counts as absent. */
export const pathExists = (path: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    pipe(
      fs.exists(path),
      Effect.orElseSucceed(() => false)
    )
  );

export const isDirectory = (path: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    pipe(
      fs.stat(path),
      Effect.map((info) => info.type === "Directory"),
      Effect.orElseSucceed(() => false)
    )
  );

/** `mkdir -p` */
export const ensureDirectory = (
  path: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    pipe(fs.makeDirectory(path, { recursive: true }), Effect.mapError(fsError("create directory", path)))
  );

/** Entry names directly under `path`, sorted by name. */
export const listDirectory = (
  path: string
): Effect.Effect<readonly string[], SystemError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    pipe(
      fs.readDirectory(path),
      Effect.map((entries) => [...entries].sort()),
      Effect.mapError(fsError("list directory", path))
    )
  );

/** `rm -rf` */
export const removePath = (path: string): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    pipe(fs.remove(path, { recursive: true }), Effect.mapError(fsError("remove", path)))
  );

export const readTextFile = (
  path: string
): Effect.Effect<string, SystemError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    pipe(fs.readFileString(path, "utf-8"), Effect.mapError(fsError("read", path)))
  );

export const writeTextFile = (
  path: string,
  content: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    pipe(fs.writeFileString(path, content), Effect.mapError(fsError("write", path)))
  );

/** Size in bytes of a regular file; None when absent. */
export const fileSize = (
  path: string
): Effect.Effect<Option.Option<number>, never, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    pipe(
      fs.stat(path),
      Effect.map((info) =>
        info.type === "File" ? Option.some(Number(info.size)) : Option.none<number>()
      ),
      Effect.orElseSucceed(() => Option.none<number>())
    )
  );

/** Removes every entry inside `path`, keeping `path` itself. */
export const emptyDirectory = (
  path: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const entries = yield* listDirectory(path);
    yield* Effect.forEach(entries, (name) => removePath(`${path}/${name}`), { discard: true });
  });
