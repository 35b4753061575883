// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Chooser service: operator decisions behind an interface so runs can be
 * driven by a terminal, flags or a script.
 */

import { Prompt } from "@effect/cli";
import { Context, Effect, Layer, Option, pipe } from "effect";

export interface ChooserService {
  /** Index into `options`; None when the operator cancels. */
  readonly choose: (
    message: string,
    options: readonly string[]
  ) => Effect.Effect<Option.Option<number>>;
  /** Free-text answer; a cancelled prompt reads as the empty string. */
  readonly ask: (message: string) => Effect.Effect<string>;
}

export interface Chooser {
  readonly _tag: "Chooser";
}

export const Chooser: Context.Tag<Chooser, ChooserService> = Context.GenericTag<
  Chooser,
  ChooserService
>("sitevault/Chooser");

/** Arrow-key menus and a text prompt on the controlling terminal. */
export const ChooserLive: Layer.Layer<Chooser, never, Prompt.Prompt.Environment> = Layer.effect(
  Chooser,
  Effect.map(Effect.context<Prompt.Prompt.Environment>(), (environment) => ({
    choose: (message, options): Effect.Effect<Option.Option<number>> =>
      options.length === 0
        ? Effect.succeed(Option.none())
        : pipe(
            Prompt.select({
              message,
              choices: options.map((title, value) => ({ title, value })),
            }),
            Prompt.run,
            Effect.option,
            Effect.provide(environment)
          ),
    ask: (message): Effect.Effect<string> =>
      pipe(
        Prompt.text({ message }),
        Prompt.run,
        Effect.orElseSucceed(() => ""),
        Effect.provide(environment)
      ),
  }))
);
