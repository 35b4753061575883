// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Archiver service using Context.Tag pattern.
 * Live layer runs `tar | <compressor>`; both stages report their own status.
 */

import { Context, type Effect, Layer } from "effect";
import type { Compressor } from "../../config/field-values";
import type { GeneralError, SystemError } from "../../lib/errors";
import { type ExecResult, type PipelineResult, exec, execPipeline } from "../exec";

export interface ArchiveRequest {
  /** Directory `tar -C` changes into. */
  readonly sourceRoot: string;
  /** Members relative to `sourceRoot`. */
  readonly paths: readonly string[];
  readonly exclude: readonly string[];
  readonly destPath: string;
  readonly compressor: Compressor;
  readonly level: number;
}

export interface ArchiverService {
  readonly create: (
    request: ArchiveRequest
  ) => Effect.Effect<PipelineResult, SystemError | GeneralError>;
  /** Integrity test of a compressed file. */
  readonly test: (
    archivePath: string,
    compressor: Compressor
  ) => Effect.Effect<ExecResult, SystemError | GeneralError>;
  /** Extracts all members, or only `members` when given. */
  readonly extract: (
    archivePath: string,
    destDir: string,
    members?: readonly string[]
  ) => Effect.Effect<ExecResult, SystemError | GeneralError>;
}

export interface Archiver {
  readonly _tag: "Archiver";
}

export const Archiver: Context.Tag<Archiver, ArchiverService> = Context.GenericTag<
  Archiver,
  ArchiverService
>("sitevault/Archiver");

export const tarCreateArgs = (request: ArchiveRequest): readonly string[] => [
  "tar",
  ...request.exclude.map((pattern) => `--exclude=${pattern}`),
  "-cf",
  "-",
  "-C",
  request.sourceRoot,
  ...request.paths,
];

export const compressArgs = (compressor: Compressor, level: number): readonly string[] => [
  compressor,
  `-${level}`,
];

export const tarExtractArgs = (
  archivePath: string,
  destDir: string,
  members: readonly string[] = []
): readonly string[] => ["tar", "-xzf", archivePath, "-C", destDir, ...members];

export const ArchiverLive: Layer.Layer<Archiver> = Layer.succeed(Archiver, {
  create: (request) =>
    execPipeline(
      tarCreateArgs(request),
      compressArgs(request.compressor, request.level),
      request.destPath
    ),
  test: (archivePath, compressor) => exec([compressor, "-t", archivePath]),
  extract: (archivePath, destDir, members) =>
    exec(tarExtractArgs(archivePath, destDir, members)),
});
