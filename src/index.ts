#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * sitevault - backup and restore for web shop projects
 *
 * Main entry point for the CLI application.
 * This is the "imperative shell" - the only place where Effect runtime is executed.
 */

import type { Teardown } from "@effect/platform/Runtime";
import { NodeRuntime } from "@effect/platform-node";
import { Cause, Exit, Option } from "effect";
import { exitCodeFromExit } from "./cli/exit-code";
import { program } from "./cli/index";

/** Failures were already logged by the command runner; only defects are reported here. */
const logExitError = <A, E>(exit: Exit.Exit<A, E>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void =>
          Cause.isInterruptedOnly(cause)
            ? console.error("Interrupted")
            : console.error("Unexpected error:", Cause.pretty(cause)),
        onSome: (): void => undefined,
      }),
  });

/** SIGINT and SIGTERM interrupt the main fiber, so finalizers run before the exit code is set. */
const teardown: Teardown = (exit, onExit) => {
  logExitError(exit);
  onExit(exitCodeFromExit(exit));
};

if (require.main === module) {
  NodeRuntime.runMain(program(process.argv), {
    disableErrorReporting: true,
    disablePrettyLogger: true,
    teardown,
  });
}
