// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdirSync, writeFileSync } from "node:fs";
import { Effect, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { defaultConfig, loadConfig, parseConfig } from "../../src/config/loader";
import type { ConfigError, SystemError } from "../../src/lib/errors";
import type { AbsolutePath } from "../../src/lib/types";
import { makeTempRoot, removeTempRoot } from "../helpers/fixtures";
import { runTest } from "../helpers/layers";

/** `reason: message` of a failed load, or "ok". */
const outcomeOf = <A, R>(
  effect: Effect.Effect<A, ConfigError | SystemError, R>
): Effect.Effect<string, never, R> =>
  effect.pipe(
    Effect.map((): string => "ok"),
    Effect.catchAll((e) =>
      Effect.succeed(e._tag === "ConfigError" ? `${e.reason}: ${e.message}` : e.message)
    )
  );

describe("parseConfig", () => {
  test("fills defaults for absent sections", async () => {
    const config = await runTest(
      parseConfig('[paths]\nprojectRoot = "/srv/www"\n\n[retention]\nkeep = 5\n', "test.toml")
    );

    expect(config.paths).toEqual({ projectRoot: "/srv/www", backupRoot: "~/backup" });
    expect(config.retention.keep).toBe(5);
    expect(config.archive).toEqual({ compressionLevel: 9, compressor: "pigz" });
    expect(config.project.cacheProtected).toEqual(["min", ".htaccess"]);
  });

  test("a TOML syntax error is config-parse", async () => {
    const result = await runTest(
      parseConfig("[paths\n", "bad.toml").pipe(
        Effect.map((): string => "ok"),
        Effect.catchAll((e) => Effect.succeed(e.reason))
      )
    );

    expect(result).toBe("config-parse");
  });

  test("schema violations list every offending key", async () => {
    const result = await runTest(
      parseConfig(
        '[archive]\ncompressionLevel = 12\n\n[paths]\nbackupRoot = "relative"\n',
        "bad.toml"
      ).pipe(
        Effect.map((): string => "ok"),
        Effect.catchAll((e) => Effect.succeed(`${e.reason}: ${e.message}`))
      )
    );

    expect(result).toBe(
      [
        "config-validation: Invalid configuration in bad.toml:",
        "  paths.backupRoot: Path must be absolute or start with ~/",
        "  archive.compressionLevel: Number must be less than or equal to 9",
      ].join("\n")
    );
  });

  test("project paths may not escape the project", async () => {
    const result = await runTest(
      parseConfig('[project]\nconfigFile = "../secrets.php"\n', "bad.toml").pipe(
        Effect.map((): string => "ok"),
        Effect.catchAll((e) => Effect.succeed(e.reason))
      )
    );

    expect(result).toBe("config-validation");
  });
});

describe("loadConfig", () => {
  let home: AbsolutePath;

  beforeEach(() => {
    home = makeTempRoot();
  });

  afterEach(() => {
    removeTempRoot(home);
  });

  test("an explicit path must exist", async () => {
    const result = await runTest(outcomeOf(loadConfig(Option.some(`${home}/none.toml`), home)));

    expect(result).toBe(`config-not-found: Configuration file not found: ${home}/none.toml`);
  });

  test("an explicit path is loaded and reported as the source", async () => {
    const file = `${home}/custom.toml`;
    writeFileSync(file, "[retention]\nkeep = 7\n");
    const { config, source } = await runTest(loadConfig(Option.some(file), home));

    expect(config.retention.keep).toBe(7);
    expect(source).toEqual(Option.some(file));
  });

  test("the user config directory is searched first", async () => {
    mkdirSync(`${home}/.config/sitevault`, { recursive: true });
    writeFileSync(`${home}/.config/sitevault/sitevault.toml`, "[retention]\nkeep = 4\n");
    const { config, source } = await runTest(loadConfig(Option.none(), home));

    expect(config.retention.keep).toBe(4);
    expect(source).toEqual(Option.some(`${home}/.config/sitevault/sitevault.toml`));
  });
});

describe("defaultConfig", () => {
  test("matches the documented defaults", () => {
    expect(defaultConfig()).toEqual({
      paths: { projectRoot: "~/public_html", backupRoot: "~/backup" },
      retention: { keep: 2 },
      archive: { compressionLevel: 9, compressor: "pigz" },
      project: {
        configFile: "includes/config.JTL-Shop.ini.php",
        cacheDir: "templates_c",
        cacheProtected: ["min", ".htaccess"],
        mediaDir: "media",
        webExclude: ["media", "mediafiles"],
      },
      cache: { attempts: 3, delayMs: 2000 },
      logging: { level: "info", format: "pretty" },
    });
  });
});
