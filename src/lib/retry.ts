// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Bounded retry built on Effect Schedule.
 */

import { Data, Duration, Effect, Schedule, pipe } from "effect";

/**
 * Fixed interval between attempts, `attempts` tries in total.
 * `attempts <= 1` means a single try with no retry.
 */
export const fixedRetrySchedule = (
  attempts: number,
  delayMs: number
): Schedule.Schedule<[number, number], unknown, never> =>
  pipe(
    Schedule.spaced(Duration.millis(delayMs)),
    Schedule.intersect(Schedule.recurs(Math.max(attempts - 1, 0)))
  );

/** The predicate still rejected the outcome after the last attempt. */
export class RetryExhausted extends Data.TaggedError("RetryExhausted")<{
  readonly attempts: number;
  readonly message: string;
}> {}

export interface RetryUntilOptions<A> {
  readonly attempts: number;
  readonly delayMs: number;
  /** Decides whether an attempt's outcome counts as success. */
  readonly succeeded: (outcome: A) => boolean;
  /** Explains a rejected outcome in the exhaustion message. */
  readonly describe?: (outcome: A) => string;
}

/**
 * Run `attempt` until `succeeded` accepts its outcome, at most `attempts` times.
 * Errors of the attempt itself are retried the same way; the final error is
 * surfaced unchanged.
 */
export const retryUntil = <A, E, R>(
  attempt: Effect.Effect<A, E, R>,
  options: RetryUntilOptions<A>
): Effect.Effect<A, E | RetryExhausted, R> => {
  const attempts = Math.max(options.attempts, 1);
  const checked: Effect.Effect<A, E | RetryExhausted, R> = Effect.flatMap(attempt, (outcome) =>
    options.succeeded(outcome)
      ? Effect.succeed(outcome)
      : Effect.fail(
          new RetryExhausted({
            attempts,
            message: options.describe?.(outcome) ?? "outcome rejected",
          })
        )
  );
  return Effect.retry(checked, fixedRetrySchedule(attempts, options.delayMs));
};
