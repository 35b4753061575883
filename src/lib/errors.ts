// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for sitevault.
 * Every failure carries a typed error code that is also the process exit code.
 */

import { Data } from "effect";

interface ErrorCodeMap {
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly DUMP_FAILED: 2;
  readonly WEB_ARCHIVE_FAILED: 3;
  readonly MEDIA_ARCHIVE_FAILED: 4;
  readonly RESTORE_DB_FAILED: 5;
  readonly RESTORE_WEB_FAILED: 6;
  readonly RESTORE_MEDIA_FAILED: 7;
}

/**
 * Error codes for all sitevault operations.
 * Setup, configuration and unexpected tool failures share GENERAL_ERROR;
 * each artifact step gets its own code so operators can tell them apart.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  DUMP_FAILED: 2,
  WEB_ARCHIVE_FAILED: 3,
  MEDIA_ARCHIVE_FAILED: 4,
  RESTORE_DB_FAILED: 5,
  RESTORE_WEB_FAILED: 6,
  RESTORE_MEDIA_FAILED: 7,
};

export type BackupErrorCode =
  | typeof ErrorCode.GENERAL_ERROR
  | typeof ErrorCode.DUMP_FAILED
  | typeof ErrorCode.WEB_ARCHIVE_FAILED
  | typeof ErrorCode.MEDIA_ARCHIVE_FAILED;

export type RestoreErrorCode =
  | typeof ErrorCode.GENERAL_ERROR
  | typeof ErrorCode.RESTORE_DB_FAILED
  | typeof ErrorCode.RESTORE_WEB_FAILED
  | typeof ErrorCode.RESTORE_MEDIA_FAILED;

/** Why a configuration step failed. */
export type ConfigErrorReason =
  | "config-not-found"
  | "config-parse"
  | "config-validation"
  | "missing-credential"
  | "unknown-project";

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: typeof ErrorCode.GENERAL_ERROR;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: typeof ErrorCode.GENERAL_ERROR;
  readonly reason: ConfigErrorReason;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

/** Filesystem or subprocess failure outside a step with its own exit code. */
export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: typeof ErrorCode.GENERAL_ERROR;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class BackupError extends Data.TaggedError("BackupError")<{
  readonly code: BackupErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class RestoreError extends Data.TaggedError("RestoreError")<{
  readonly code: RestoreErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export type SitevaultError = GeneralError | ConfigError | SystemError | BackupError | RestoreError;

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

/**
 * Cause props for error constructors.
 *
 * @example
 * new SystemError({
 *   code: ErrorCode.GENERAL_ERROR,
 *   message: `Failed to write ${path}`,
 *   ...causeProps(e),
 * })
 */
export const causeProps = (e: unknown): { readonly cause?: Error } =>
  e instanceof Error ? { cause: e } : {};
