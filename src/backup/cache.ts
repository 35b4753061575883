// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Template cache cleanup before archiving. Best effort: never fails the run.
 */

import type { FileSystem } from "@effect/platform";
import { Data, Effect, Match, Ref, pipe } from "effect";
import { errorMessage } from "../lib/errors";
import { logSuccess } from "../lib/log";
import { retryUntil } from "../lib/retry";
import { isDirectory, listDirectory, removePath } from "../system/fs";

export interface CacheRetryPolicy {
  readonly attempts: number;
  readonly delayMs: number;
}

export type CacheCleanupOutcome = Data.TaggedEnum<{
  Cleaned: { readonly attempts: number };
  Skipped: { readonly reason: string };
  Failed: { readonly remaining: readonly string[]; readonly detail: string };
}>;

export const CacheCleanupOutcome = Data.taggedEnum<CacheCleanupOutcome>();

/** Entries that are not protected. */
export const disallowedEntries = (
  entries: readonly string[],
  protectedEntries: readonly string[]
): readonly string[] => entries.filter((e) => !protectedEntries.includes(e));

/**
 * Deletes every disallowed entry, then re-lists. The fresh listing is the
 * attempt's outcome; a single removal error does not end the attempt.
 */
const cleanOnce = (
  cacheDir: string,
  protectedEntries: readonly string[]
): Effect.Effect<readonly string[], string, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const targets = disallowedEntries(yield* listDirectory(cacheDir), protectedEntries);
    yield* Effect.forEach(
      targets,
      (name) =>
        pipe(
          removePath(`${cacheDir}/${name}`),
          Effect.catchAll((e) => Effect.logDebug(`Cache entry not removed: ${e.message}`))
        ),
      { discard: true }
    );
    return disallowedEntries(yield* listDirectory(cacheDir), protectedEntries);
  }).pipe(Effect.mapError((e) => e.message));

export const cleanTemplateCache = (
  cacheDir: string,
  protectedEntries: readonly string[],
  policy: CacheRetryPolicy
): Effect.Effect<CacheCleanupOutcome, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* isDirectory(cacheDir))) {
      yield* Effect.logInfo(`Cache directory not found, skipping cleanup: ${cacheDir}`);
      return CacheCleanupOutcome.Skipped({ reason: `${cacheDir} does not exist` });
    }

    yield* Effect.logInfo(`Cleaning cache directory: ${cacheDir}`);
    const counter = yield* Ref.make(0);
    const attempt = Effect.zipRight(
      Ref.update(counter, (n) => n + 1),
      cleanOnce(cacheDir, protectedEntries)
    );

    const outcome: CacheCleanupOutcome = yield* pipe(
      retryUntil(attempt, {
        attempts: policy.attempts,
        delayMs: policy.delayMs,
        succeeded: (remaining) => remaining.length === 0,
        describe: (remaining) => `still present: ${remaining.join(", ")}`,
      }),
      Effect.zipRight(Ref.get(counter)),
      Effect.map((attempts) => CacheCleanupOutcome.Cleaned({ attempts })),
      Effect.catchAll((e) =>
        Effect.map(
          Effect.orElseSucceed(listDirectory(cacheDir), (): readonly string[] => []),
          (entries) =>
            CacheCleanupOutcome.Failed({
              remaining: disallowedEntries(entries, protectedEntries),
              detail: typeof e === "string" ? e : errorMessage(e),
            })
        )
      )
    );

    yield* pipe(
      Match.value<CacheCleanupOutcome>(outcome),
      Match.tag("Cleaned", () => logSuccess(`Cache directory cleaned: ${cacheDir}`)),
      Match.tag("Failed", ({ detail }) =>
        Effect.logError(
          `Could not fully clean ${cacheDir} after ${policy.attempts} attempts (${detail}); continuing`
        )
      ),
      Match.tag("Skipped", () => Effect.void),
      Match.exhaustive
    );
    return outcome;
  });
