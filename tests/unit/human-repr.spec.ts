// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

import { describe, it, expect } from "vitest";
import { Url } from "../../src/url";

describe("Url.humanRepr", () => {
  it("decodes hosts, paths, queries and fragments", () => {
    const url = new Url(
      "http://xn--e1afmkfd.xn--p1ai/%D0%BF%D1%83%D1%82%D1%8C?%D0%BA=%D0%B7#%D1%84",
    );
    expect(url.humanRepr()).toBe("http://пример.рф/путь?к=з#ф");
  });

  it("keeps bracketed IPv6 hosts and explicit ports", () => {
    expect(new Url("http://[::1]:8080/path").humanRepr()).toBe(
      "http://[::1]:8080/path",
    );
  });

  it("re-escapes characters that would change the structure", () => {
    expect(new Url("http://example.com/a%23b").humanRepr()).toBe(
      "http://example.com/a%23b",
    );
    expect(new Url("http://us%40er:pw@example.com/").humanRepr()).toBe(
      "http://us%40er:pw@example.com/",
    );
    expect(new Url("http://example.com/?a=b%26c").humanRepr()).toBe(
      "http://example.com/?a=b%26c",
    );
  });

  it("shows printable characters such as spaces as they are", () => {
    expect(new Url("http://example.com/a%20b").humanRepr()).toBe(
      "http://example.com/a b",
    );
  });
});
