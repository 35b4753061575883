// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Ref } from "effect";
import { describe, expect, test } from "vitest";
import { RetryExhausted, retryUntil } from "../../src/lib/retry";

/** Counts attempts; each one yields how many entries are still left. */
const countdown = (start: number) =>
  Effect.map(Ref.make(0), (calls) => ({
    calls,
    attempt: Ref.updateAndGet(calls, (n) => n + 1).pipe(Effect.map((n) => Math.max(start - n, 0))),
  }));

describe("retryUntil", () => {
  test("stops at the first accepted outcome", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const { calls, attempt } = yield* countdown(3);
        const left = yield* retryUntil(attempt, {
          attempts: 5,
          delayMs: 0,
          succeeded: (n) => n === 0,
        });
        return { left, calls: yield* Ref.get(calls) };
      })
    );

    expect(result).toEqual({ left: 0, calls: 3 });
  });

  test("gives up after the allowed attempts with the last outcome described", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const { calls, attempt } = yield* countdown(10);
        const error = yield* Effect.flip(
          retryUntil(attempt, {
            attempts: 3,
            delayMs: 0,
            succeeded: (n) => n === 0,
            describe: (n) => `${n} left`,
          })
        );
        return { error, calls: yield* Ref.get(calls) };
      })
    );

    expect(result.calls).toBe(3);
    expect(result.error).toBeInstanceOf(RetryExhausted);
    expect({ attempts: result.error.attempts, message: result.error.message }).toEqual({
      attempts: 3,
      message: "7 left",
    });
  });

  test("fewer than one attempt still tries once", async () => {
    const calls = await Effect.runPromise(
      Effect.gen(function* () {
        const { calls, attempt } = yield* countdown(10);
        yield* Effect.either(retryUntil(attempt, { attempts: 0, delayMs: 0, succeeded: (n) => n === 0 }));
        return yield* Ref.get(calls);
      })
    );

    expect(calls).toBe(1);
  });

  test("errors of the attempt are retried and the last one surfaces", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const calls = yield* Ref.make(0);
        const attempt = Ref.updateAndGet(calls, (n) => n + 1).pipe(
          Effect.flatMap((n) => Effect.fail(`failure ${n}`))
        );
        const error = yield* Effect.flip(
          retryUntil(attempt, { attempts: 2, delayMs: 0, succeeded: () => true })
        );
        return { error, calls: yield* Ref.get(calls) };
      })
    );

    expect(result).toEqual({ error: "failure 2", calls: 2 });
  });
});
