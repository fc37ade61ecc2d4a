// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

import { describe, it, expect } from "vitest";
import { InvalidParameterError } from "../../src/errors";
import { QueryParams } from "../../src/query";
import { Url } from "../../src/url";

const url = new Url("http://example.com/?a=1&b=2&a=3");

describe("Url query views", () => {
  it("keeps repeated keys", () => {
    expect(url.query.getAll("a")).toEqual(["1", "3"]);
    expect(url.queryString).toBe("a=1&b=2&a=3");
  });

  it("decodes escaped separators in values", () => {
    const escaped = new Url("http://example.com/?q=a%26b");
    expect(escaped.rawQueryString).toBe("q=a%26b");
    expect(escaped.query.get("q")).toBe("a&b");
    expect(escaped.queryString).toBe("q=a%26b");
  });

  it("decodes plus signs as spaces in values", () => {
    expect(new Url("http://example.com/?q=a+b").query.get("q")).toBe("a b");
  });
});

describe("Url.withQuery", () => {
  it("replaces the query from a mapping", () => {
    expect(url.withQuery({ c: "3" }).toString()).toBe("http://example.com/?c=3");
  });

  it("clears the query with null", () => {
    expect(url.withQuery(null).toString()).toBe("http://example.com/");
  });

  it("accepts keyword-style fields", () => {
    expect(url.withQuery(undefined, { x: "1" }).rawQueryString).toBe("x=1");
  });

  it("accepts text, pair lists and parsed parameters", () => {
    expect(url.withQuery("a b").rawQueryString).toBe("a+b");
    expect(
      url.withQuery([
        ["k", "v"],
        ["k", "w"],
      ]).rawQueryString,
    ).toBe("k=v&k=w");
    expect(url.withQuery(new QueryParams([["p", "1 2"]])).rawQueryString).toBe(
      "p=1+2",
    );
  });

  it("rejects a query together with fields", () => {
    expect(() => url.withQuery("a=1", { x: 1 })).toThrow(InvalidParameterError);
  });
});

describe("Url.extendQuery", () => {
  it("appends without touching existing pairs", () => {
    expect(new Url("http://example.com/?a=1").extendQuery({ a: "2" }).rawQueryString).toBe(
      "a=1&a=2",
    );
  });

  it("returns the same instance for an empty addition", () => {
    expect(url.extendQuery({})).toBe(url);
  });
});

describe("Url.updateQuery", () => {
  it("overwrites in place and drops left-over occurrences", () => {
    expect(url.updateQuery({ a: "x" }).rawQueryString).toBe("a=x&b=2");
  });

  it("appends new keys", () => {
    expect(url.updateQuery({ c: "9" }).rawQueryString).toBe("a=1&b=2&a=3&c=9");
  });

  it("returns the same instance when nothing changes", () => {
    const single = new Url("http://example.com/?a=1");
    expect(single.updateQuery({ a: "1" })).toBe(single);
  });

  it("clears the query with null", () => {
    expect(url.updateQuery(null).rawQueryString).toBe("");
  });
});

describe("Url.withoutQueryParams", () => {
  it("drops every occurrence of the listed keys", () => {
    expect(url.withoutQueryParams("a").rawQueryString).toBe("b=2");
  });

  it("returns the same instance when no key matches", () => {
    expect(url.withoutQueryParams("missing")).toBe(url);
  });
});
