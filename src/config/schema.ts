// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Zod schema for sitevault.toml.
 * Single source of truth for configuration structure, validation and defaults.
 */

import type { Option } from "effect";
import { z } from "zod";
import type { AbsolutePath } from "../lib/types";
import {
  type BackupMode,
  COMPRESSOR_VALUES,
  type Compressor,
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "./field-values";

/** Absolute, or relative to the home directory through a leading `~`. */
export const homePathSchema = z
  .string()
  .refine((s) => s.startsWith("/") || s === "~" || s.startsWith("~/"), {
    message: "Path must be absolute or start with ~/",
  });

/** A single path segment: no separators, not `.` or `..`. */
const entryNameSchema = z
  .string()
  .min(1)
  .refine((s) => !s.includes("/") && s !== "." && s !== "..", {
    message: "Must be a single directory entry name",
  });

/** A path inside the project directory; must not escape it. */
const projectRelativePathSchema = z
  .string()
  .min(1)
  .refine((s) => !s.startsWith("/") && !s.split("/").includes(".."), {
    message: "Must be a relative path inside the project",
  });

export const sitevaultConfigSchema = z.object({
  paths: z
    .object({
      projectRoot: homePathSchema.default("~/public_html"),
      backupRoot: homePathSchema.default("~/backup"),
    })
    .default({}),
  retention: z
    .object({
      keep: z.number().int().min(0).default(2),
    })
    .default({}),
  archive: z
    .object({
      compressionLevel: z.number().int().min(1).max(9).default(9),
      compressor: z.enum(COMPRESSOR_VALUES).default("pigz"),
    })
    .default({}),
  project: z
    .object({
      configFile: projectRelativePathSchema.default("includes/config.JTL-Shop.ini.php"),
      cacheDir: projectRelativePathSchema.default("templates_c"),
      cacheProtected: z.array(entryNameSchema).default(["min", ".htaccess"]),
      mediaDir: entryNameSchema.default("media"),
      webExclude: z.array(z.string().min(1)).default(["media", "mediafiles"]),
    })
    .default({}),
  cache: z
    .object({
      attempts: z.number().int().min(1).max(10).default(3),
      delayMs: z.number().int().min(0).default(2000),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_VALUES).default(LOG_LEVEL_DEFAULT),
      format: z.enum(LOG_FORMAT_VALUES).default(LOG_FORMAT_DEFAULT),
    })
    .default({}),
});

export type SitevaultConfig = z.infer<typeof sitevaultConfigSchema>;

/** Layout of one project directory, shared by every project under the root. */
export interface ProjectLayout {
  readonly configFile: string;
  readonly cacheDir: string;
  readonly cacheProtected: readonly string[];
  readonly mediaDir: string;
  readonly webExclude: readonly string[];
}

/**
 * Effective settings after merging CLI flags, environment and file.
 * Paths are expanded and absolute.
 */
export interface Settings {
  readonly projectRoot: AbsolutePath;
  readonly backupRoot: AbsolutePath;
  readonly keep: number;
  readonly compressionLevel: number;
  readonly compressor: Compressor;
  readonly project: ProjectLayout;
  readonly cache: {
    readonly attempts: number;
    readonly delayMs: number;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
}

/** Choices fixed before a backup run; None fields are asked for. */
export interface BackupPresets {
  readonly project: Option.Option<string>;
  readonly mode: Option.Option<BackupMode>;
  readonly dryRun: boolean;
}

/** Choices fixed before a restore run; None fields are asked for. */
export interface RestorePresets {
  readonly project: Option.Option<string>;
  readonly backup: Option.Option<string>;
  readonly confirm: Option.Option<string>;
}
