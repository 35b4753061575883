// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import {
  buildDropTablesSql,
  parseTableList,
  quoteIdentifier,
  renderOptionFile,
} from "../../../src/system/services/database";

describe("renderOptionFile", () => {
  test("writes a client section with quoted values", () => {
    expect(
      renderOptionFile({ host: "localhost", name: "shop", user: "shop_user", password: 'te"st\\secret' })
    ).toBe(
      ["[client]", 'host="localhost"', 'user="shop_user"', 'password="te\\"st\\\\secret"', ""].join("\n")
    );
  });

  test("does not carry the database name", () => {
    expect(
      renderOptionFile({ host: "h", name: "shop_db", user: "u", password: "test-secret" }).includes("shop_db")
    ).toBe(false);
  });
});

describe("quoteIdentifier", () => {
  test.each([
    ["orders", "`orders`"],
    ["we`ird", "`we``ird`"],
    ["with space", "`with space`"],
  ])("%s", (name, expected) => {
    expect(quoteIdentifier(name)).toBe(expected);
  });
});

describe("buildDropTablesSql", () => {
  test("wraps the drops in foreign-key toggles", () => {
    expect(buildDropTablesSql(["a", "b"])).toBe(
      "SET FOREIGN_KEY_CHECKS=0; DROP TABLE IF EXISTS `a`; DROP TABLE IF EXISTS `b`; SET FOREIGN_KEY_CHECKS=1;"
    );
  });
});

describe("parseTableList", () => {
  test("one name per line, blank lines dropped", () => {
    expect(parseTableList("orders\nproducts \n\n")).toEqual(["orders", "products"]);
  });

  test("no output means no tables", () => {
    expect(parseTableList("")).toEqual([]);
  });
});
