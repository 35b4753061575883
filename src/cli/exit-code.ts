// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Cause, Exit, Match, Option, pipe } from "effect";

/** The failure's `code` is the exit code; defects and interruptions exit 1. */
export const exitCodeFromExit = <A>(exit: Exit.Exit<A, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => 1,
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(
              (v: unknown): v is { code: number } =>
                typeof v === "object" && v !== null && "code" in v && typeof v.code === "number",
              (v: { code: number }) => v.code
            ),
            Match.orElse(() => 1)
          ),
      }),
  });
