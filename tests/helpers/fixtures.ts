// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * On-disk fixtures: a project root with one shop and a backup root.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ArtifactKind, BackupSet } from "../../src/backup/types";
import type { Settings } from "../../src/config/schema";
import { type AbsolutePath, isBackupTimestamp, path } from "../../src/lib/types";

export const SHOP_CONFIG = [
  "<?php",
  "define('DB_HOST', 'localhost');",
  "define('DB_NAME', 'shop_db');",
  "define('DB_USER', 'shop_user');",
  "define('DB_PASS', 'test-secret');",
  "",
].join("\n");

export const ARCHIVED_CONFIG = [
  "<?php",
  'define("DB_HOST", "db.internal");',
  'define("DB_NAME", "shop_archived");',
  'define("DB_USER", "archived_user");',
  'define("DB_PASS", "test-secret");',
  "",
].join("\n");

export const makeTempRoot = (): AbsolutePath =>
  path(mkdtempSync(join(tmpdir(), "sitevault-test-")));

export const removeTempRoot = (root: string): void => {
  rmSync(root, { recursive: true, force: true });
};

export const testSettings = (root: AbsolutePath, overrides: Partial<Settings> = {}): Settings => ({
  projectRoot: path(`${root}/projects`),
  backupRoot: path(`${root}/backup`),
  keep: 2,
  compressionLevel: 9,
  compressor: "gzip",
  project: {
    configFile: "includes/config.JTL-Shop.ini.php",
    cacheDir: "templates_c",
    cacheProtected: ["min", ".htaccess"],
    mediaDir: "media",
    webExclude: ["media", "mediafiles"],
  },
  cache: { attempts: 3, delayMs: 0 },
  logging: { level: "info", format: "pretty" },
  ...overrides,
});

const write = (file: string, content: string): void => {
  mkdirSync(join(file, ".."), { recursive: true });
  writeFileSync(file, content);
};

/** `<root>/projects/<name>` with a config file, a template cache and media. */
export const createShop = (root: AbsolutePath, name: string, config = SHOP_CONFIG): AbsolutePath => {
  const dir = `${root}/projects/${name}`;
  write(`${dir}/includes/config.JTL-Shop.ini.php`, config);
  write(`${dir}/index.php`, "<?php echo 'shop';\n");
  write(`${dir}/templates_c/.htaccess`, "Deny from all\n");
  write(`${dir}/templates_c/min/keep.css`, "body{}\n");
  write(`${dir}/templates_c/compiled_1.php`, "<?php // compiled\n");
  write(`${dir}/templates_c/compiled_2.php`, "<?php // compiled\n");
  write(`${dir}/media/image.jpg`, "jpeg");
  return path(dir);
};

/**
 * `<root>/backup/bak.<project>/<timestamp>` holding the given files.
 * `complete` adds metadata.txt.
 */
export const createSet = (
  root: AbsolutePath,
  project: string,
  timestamp: string,
  options: { readonly complete?: boolean; readonly files?: readonly string[] } = {}
): AbsolutePath => {
  const dir = `${root}/backup/bak.${project}/${timestamp}`;
  mkdirSync(dir, { recursive: true });
  for (const file of options.files ?? ["db_backup.sql", "web_backup.tar.gz", "media_backup.tar.gz"]) {
    writeFileSync(`${dir}/${file}`, `${file} content`);
  }
  if (options.complete ?? true) {
    writeFileSync(
      `${dir}/metadata.txt`,
      `=== Backup Metadata ===\nProject: ${project}\nMode: all\n`
    );
  }
  return path(dir);
};

/** A backup set value for pure functions; nothing is written. */
export const backupSet = (
  timestamp: string,
  options: { readonly complete?: boolean; readonly artifacts?: readonly ArtifactKind[] } = {}
): BackupSet => {
  if (!isBackupTimestamp(timestamp)) {
    throw new Error(`not a backup timestamp: ${timestamp}`);
  }
  return {
    timestamp,
    dir: path(`/backup/bak.shop/${timestamp}`),
    complete: options.complete ?? true,
    artifacts: options.artifacts ?? ["database", "web", "media"],
  };
};
