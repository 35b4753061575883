// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { readFileSync, writeFileSync } from "node:fs";
import { Cause, Effect, HashMap, LogLevel } from "effect";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  SitevaultLoggerLive,
  TranscriptLoggerLive,
  formatJson,
  formatLogTimestamp,
  formatPretty,
  messageToString,
  recordTranscriptFailure,
} from "../../src/lib/effect-logger";
import { createStepCounter, logSuccess, withProject } from "../../src/lib/log";
import type { AbsolutePath } from "../../src/lib/types";
import { makeTempRoot, removeTempRoot } from "../helpers/fixtures";
import { captureLogs, runTest } from "../helpers/layers";

const DATE = new Date(2024, 0, 5, 3, 4, 5);
const STAMP = "[2024-01-05 03:04:05]";

describe("formatLogTimestamp", () => {
  test("local time, zero-padded", () => {
    expect(formatLogTimestamp(DATE)).toBe("2024-01-05 03:04:05");
  });
});

describe("messageToString", () => {
  test("joins multi-value messages with spaces", () => {
    expect(messageToString(["a", 1, true])).toBe("a 1 true");
    expect(messageToString("plain")).toBe("plain");
  });
});

describe("formatPretty", () => {
  test("level is padded and the project tag precedes the message", () => {
    expect(
      formatPretty(LogLevel.Info, "hello", HashMap.make(["project", "shop"]), Cause.empty, DATE, false)
    ).toBe(`${STAMP} INFO  [shop] hello`);
  });

  test("a record without project has no tag", () => {
    expect(formatPretty(LogLevel.Warning, "careful", HashMap.empty(), Cause.empty, DATE, false)).toBe(
      `${STAMP} WARN  careful`
    );
  });

  test("step records show their position", () => {
    const annotations = HashMap.make(
      ["logStyle", "step"],
      ["stepNumber", "2"],
      ["stepTotal", "5"]
    );
    expect(formatPretty(LogLevel.Info, "Dumping", annotations, Cause.empty, DATE, false)).toBe(
      `${STAMP} [2/5] → Dumping`
    );
  });

  test("success and failure markers replace the level", () => {
    expect(
      formatPretty(LogLevel.Info, "done", HashMap.make(["logStyle", "success"]), Cause.empty, DATE, false)
    ).toBe(`${STAMP} ✓ done`);
    expect(
      formatPretty(LogLevel.Info, "broken", HashMap.make(["logStyle", "fail"]), Cause.empty, DATE, false)
    ).toBe(`${STAMP} ✗ broken`);
  });

  test("colour wraps the success marker", () => {
    expect(
      formatPretty(LogLevel.Info, "done", HashMap.make(["logStyle", "success"]), Cause.empty, DATE, true)
    ).toBe("\x1b[90m[2024-01-05 03:04:05]\x1b[0m \x1b[32m✓\x1b[0m done");
  });
});

describe("formatJson", () => {
  test("keeps external annotations and drops formatting ones", () => {
    const line = formatJson(
      LogLevel.Warning,
      "slow",
      HashMap.make(["project", "shop"], ["logStyle", "step"], ["stepNumber", "1"]),
      new Date(Date.UTC(2024, 0, 5, 3, 4, 5))
    );

    expect(JSON.parse(line)).toEqual({
      timestamp: "2024-01-05T03:04:05.000Z",
      level: "warn",
      message: "slow",
      project: "shop",
    });
  });
});

describe("log helpers", () => {
  test("the step counter numbers its lines", async () => {
    const logs = captureLogs();
    await runTest(
      Effect.gen(function* () {
        const steps = yield* createStepCounter(2);
        yield* steps.next("first");
        yield* steps.next("second");
      }).pipe(Effect.provide(logs.layer))
    );

    expect(logs.lines).toEqual(["INFO first", "INFO second"]);
  });
});

describe("transcript", () => {
  let root: AbsolutePath;

  beforeEach(() => {
    root = makeTempRoot();
  });

  afterEach(() => {
    removeTempRoot(root);
  });

  const lines = (file: string): readonly string[] =>
    readFileSync(file, "utf8").trimEnd().split("\n").map((l) => l.slice(STAMP.length + 1));

  test("records every level as plain text", async () => {
    const file = `${root}/backup.log`;
    await runTest(
      Effect.gen(function* () {
        yield* Effect.logInfo("started");
        yield* Effect.logWarning("careful");
        yield* logSuccess("finished");
      }).pipe(withProject("shop"), Effect.provide(TranscriptLoggerLive(file)))
    );

    expect(lines(file)).toEqual(["INFO  [shop] started", "WARN  [shop] careful", "✓ finished"]);
  });

  test("recordTranscriptFailure appends one ERROR line", async () => {
    const file = `${root}/backup.log`;
    await runTest(
      recordTranscriptFailure("Database dump failed").pipe(Effect.provide(TranscriptLoggerLive(file)))
    );

    expect(lines(file)).toEqual(["ERROR Database dump failed"]);
  });

  test("appends to an existing transcript", async () => {
    const file = `${root}/backup.log`;
    writeFileSync(file, `${STAMP} INFO  earlier\n`);
    await runTest(Effect.logInfo("later").pipe(Effect.provide(TranscriptLoggerLive(file))));

    expect(lines(file)).toEqual(["INFO  earlier", "INFO  later"]);
  });

  describe("beside the console logger", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    const written = (spy: { readonly mock: { readonly calls: ReadonlyArray<readonly unknown[]> } }) =>
      spy.mock.calls.map(([chunk]) => String(chunk).slice(STAMP.length + 1));

    test("the console level does not limit the transcript", async () => {
      const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
      const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      const file = `${root}/backup.log`;
      await runTest(
        Effect.gen(function* () {
          yield* Effect.logDebug("detail");
          yield* Effect.logInfo("started");
          yield* Effect.logError("broken");
        }).pipe(
          Effect.provide(TranscriptLoggerLive(file)),
          Effect.provide(SitevaultLoggerLive({ level: "error", format: "pretty", color: false }))
        )
      );

      expect(written(stdout).filter((l) => l.includes("started"))).toEqual([]);
      expect(written(stderr)).toEqual(["ERROR broken\n"]);
      expect(lines(file)).toEqual(["INFO  started", "ERROR broken"]);
    });

    test("transcript-only records never reach the console", async () => {
      const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      const file = `${root}/backup.log`;
      await runTest(
        recordTranscriptFailure("Database dump failed").pipe(
          Effect.provide(TranscriptLoggerLive(file)),
          Effect.provide(SitevaultLoggerLive({ level: "debug", format: "pretty", color: false }))
        )
      );

      expect(written(stderr)).toEqual([]);
      expect(lines(file)).toEqual(["ERROR Database dump failed"]);
    });
  });
});
