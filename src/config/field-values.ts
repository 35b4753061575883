// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

export const BACKUP_MODE_VALUES = ["all", "web_only", "media_only"] as const;
export type BackupMode = (typeof BACKUP_MODE_VALUES)[number];

export const COMPRESSOR_VALUES = ["pigz", "gzip"] as const;
export type Compressor = (typeof COMPRESSOR_VALUES)[number];
