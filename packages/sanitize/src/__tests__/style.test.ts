import { describe, expect, it } from "vitest";
import { makeSanitizer } from "./helpers.js";

describe("inline style", () => {
  it("drops properties that are not allowed", () => {
    expect(makeSanitizer().sanitize('<div style="color: red; behavior: url(x.htc)">x</div>')).toBe(
      '<div style="color: red">x</div>',
    );
  });

  it("drops expression() and removes the emptied attribute", () => {
    expect(makeSanitizer().sanitize('<div style="width:expression(alert(1))">x</div>')).toBe(
      "<div>x</div>",
    );
  });

  it("keeps the rest of the declaration when expression() is dropped", () => {
    expect(
      makeSanitizer().sanitize('<div style="width:expression(alert(1)); color: red">x</div>'),
    ).toBe('<div style="color: red">x</div>');
  });

  it("rejects escaped names and values like their decoded form", () => {
    const sanitizer = makeSanitizer();
    expect(sanitizer.sanitize('<div style="width: \\65 xpression(alert(1))">x</div>')).toBe(
      "<div>x</div>",
    );
    expect(sanitizer.sanitize('<div style="\\62 ehavior: url(x.htc)">x</div>')).toBe(
      "<div>x</div>",
    );
  });

  it("drops values matching the disallowed pattern", () => {
    expect(makeSanitizer().sanitize("<div style=\"content: '<b>'\">x</div>")).toBe("<div>x</div>");
  });

  it("honours a custom disallowed pattern", () => {
    const sanitizer = makeSanitizer({ disallowCssPropertyValue: /red/ });
    expect(sanitizer.sanitize('<div style="color: red; width: 1px">x</div>')).toBe(
      '<div style="width: 1px">x</div>',
    );
  });

  it("drops url() references with a disallowed scheme", () => {
    expect(
      makeSanitizer().sanitize(
        '<div style="background-image: url(javascript:alert(1)); color: red">x</div>',
      ),
    ).toBe('<div style="color: red">x</div>');
  });

  it("resolves url() references against the base URL", () => {
    expect(
      makeSanitizer().sanitize(
        "<div style=\"background-image: url('a.png')\">x</div>",
        "http://example.com/a/",
      ),
    ).toBe("<div style=\"background-image: url('http://example.com/a/a.png')\">x</div>");
  });

  it("moves an escaped property name to its decoded form when its url changes", () => {
    expect(
      makeSanitizer().sanitize(
        '<div style="\\62 ackground-image: url(a.png)">x</div>',
        "http://example.com/",
      ),
    ).toBe('<div style="background-image: url(http://example.com/a.png)">x</div>');
  });

  it("drops url() references whose colon is entity-encoded", () => {
    expect(
      makeSanitizer().sanitize(
        '<div style="background-image: url(javascript&amp;#58;alert(1)); color: red">x</div>',
      ),
    ).toBe('<div style="color: red">x</div>');
  });

  it("rewrites each duplicate declaration on its own", () => {
    expect(
      makeSanitizer().sanitize(
        '<div style="background-image: url(a.png); background-image: url(b.png)">x</div>',
        "http://example.com/",
      ),
    ).toBe(
      '<div style="background-image: url(http://example.com/a.png); background-image: url(http://example.com/b.png)">x</div>',
    );
  });

  it("leaves earlier declarations alone when an escaped name is decoded", () => {
    const report = makeSanitizer().sanitizeWithReport(
      '<div style="background-image: none; \\62 ackground-image: url(a.png)">x</div>',
      "http://example.com/",
    );

    expect(report.clean).toBe(
      '<div style="background-image: none; background-image: url(http://example.com/a.png)">x</div>',
    );
    expect(report.removals).toEqual([
      {
        subject: "style",
        tag: "div",
        name: "\\62 ackground-image",
        reason: "not-allowed-url-value",
      },
    ]);
  });

  it("removes a style that does not parse as a declaration list", () => {
    expect(makeSanitizer().sanitize('<div style="color: red; }">x</div>')).toBe("<div>x</div>");
  });

  it("keeps an empty style attribute that was empty to begin with", () => {
    expect(makeSanitizer().sanitize('<div style="">x</div>')).toBe('<div style="">x</div>');
  });

  it("removes attribute values containing &{", () => {
    expect(makeSanitizer().sanitize('<div id="a&amp;{b}">x</div>')).toBe("<div>x</div>");
  });
});
