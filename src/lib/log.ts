// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Styled logging helpers. Annotations carry the style; effect-logger.ts
 * decides how each style looks on the console and in the transcript.
 */

import { Data, Effect, Match, Ref, pipe } from "effect";

type LogStyle = Data.TaggedEnum<{
  step: { readonly current: number; readonly total: number };
  success: object;
  fail: object;
}>;

const { step, success, fail } = Data.taggedEnum<LogStyle>();

const encodeStyle = (style: LogStyle): Record<string, string> =>
  pipe(
    Match.value(style),
    Match.tag("step", ({ current, total }) => ({
      logStyle: "step",
      stepNumber: String(current),
      stepTotal: String(total),
    })),
    Match.tag("success", () => ({ logStyle: "success" })),
    Match.tag("fail", () => ({ logStyle: "fail" })),
    Match.exhaustive
  );

const logStyled = (style: LogStyle, message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(Effect.annotateLogs(encodeStyle(style)));

export const logStep = (current: number, total: number, message: string): Effect.Effect<void> =>
  logStyled(step({ current, total }), message);

export const logSuccess = (message: string): Effect.Effect<void> => logStyled(success(), message);

export const logFail = (message: string): Effect.Effect<void> => logStyled(fail(), message);

/** Bypasses the logger for program output (listings, banners). */
export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(`${text}\n`);
  });

/** Tags every record of the wrapped effect with the project it concerns. */
export const withProject =
  (project: string) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.annotateLogs(effect, "project", project);

export interface StepCounter {
  readonly next: (message: string) => Effect.Effect<void>;
}

/** Numbered `[n/total]` progress lines for a run's state machine. */
export const createStepCounter = (total: number): Effect.Effect<StepCounter> =>
  Effect.map(Ref.make(0), (ref) => ({
    next: (message: string): Effect.Effect<void> =>
      pipe(
        Ref.updateAndGet(ref, (n) => n + 1),
        Effect.flatMap((n) => logStep(n, total, message))
      ),
  }));
