// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Backup set layout and run outcomes.
 */

import { Data } from "effect";
import type { BackupMode } from "../config/field-values";
import type { AbsolutePath, BackupTimestamp, ProjectName } from "../lib/types";

/** Database access tuple; lives only for one run and is never written to disk. */
export interface DbCredentials {
  readonly host: string;
  readonly name: string;
  readonly user: string;
  readonly password: string;
}

export type ArtifactKind = "database" | "web" | "media";

/** Creation order, which is also restore order. */
export const ARTIFACT_KINDS: readonly ArtifactKind[] = ["database", "web", "media"];

export const ARTIFACT_FILES: Readonly<Record<ArtifactKind, string>> = {
  database: "db_backup.sql",
  web: "web_backup.tar.gz",
  media: "media_backup.tar.gz",
};

/** Written last; its presence marks a set complete. */
export const METADATA_FILE = "metadata.txt";

export const TRANSCRIPT_FILE = "backup.log";

/** `<backupRoot>/bak.<project>` */
export const projectBackupDirName = (project: string): string => `bak.${project}`;

export interface BackupSet {
  readonly timestamp: BackupTimestamp;
  readonly dir: AbsolutePath;
  /** `metadata.txt` present */
  readonly complete: boolean;
  readonly artifacts: readonly ArtifactKind[];
}

export const hasArtifact = (set: BackupSet, kind: ArtifactKind): boolean =>
  set.artifacts.includes(kind);

/** Artifacts a mode produces. The database dump is taken in every mode. */
export const artifactsForMode = (mode: BackupMode): readonly ArtifactKind[] =>
  mode === "all"
    ? ["database", "web", "media"]
    : mode === "web_only"
      ? ["database", "web"]
      : ["database", "media"];

/** An archive that failed its integrity test. Kept on disk for inspection. */
export class CorruptArtifact extends Data.TaggedClass("CorruptArtifact")<{
  readonly path: string;
  readonly detail: string;
}> {}

export type RunOutcome = Data.TaggedEnum<{
  Completed: { readonly project: ProjectName; readonly setDir: AbsolutePath };
  Planned: { readonly project: ProjectName; readonly setDir: AbsolutePath };
  Cancelled: { readonly reason: string };
}>;

export const RunOutcome = Data.taggedEnum<RunOutcome>();
