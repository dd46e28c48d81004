import {
  InternalError,
  SanitizeConfigurationError,
  SanitizeContentBlockedError,
} from "@sanitas/errors";
import { describe, expect, it } from "vitest";
import { parseSanitizerOptions } from "../config.js";
import { DEFAULT_ALLOWED_TAGS } from "../constants.js";
import { createHtmlParser, createXmlParser, isText, xmlFormatter } from "../dom.js";
import { MarkupSanitizer } from "../sanitizer.js";
import { END_TO_END_SVG, makeSanitizer } from "./helpers.js";

describe("MarkupSanitizer — defaults", () => {
  it("strips scripts and unsafe inline styles from SVG", () => {
    expect(new MarkupSanitizer().sanitize(END_TO_END_SVG)).toBe(
      '<svg><circle cx="1"></circle></svg>',
    );
  });

  it("copies the default tables per instance", () => {
    const first = new MarkupSanitizer();
    first.allowedTags.add("div");

    expect(new MarkupSanitizer().allowedTags.has("div")).toBe(false);
    expect(DEFAULT_ALLOWED_TAGS).not.toContain("div");
  });

  it("allows http and https schemes and the style and namespace at-rules", () => {
    const sanitizer = new MarkupSanitizer();

    expect([...sanitizer.allowedSchemes]).toEqual(["http", "https"]);
    expect([...sanitizer.allowedAtRules]).toEqual(["style", "namespace"]);
    expect(sanitizer.allowedClasses.size).toBe(0);
    expect(sanitizer.maxInputLength).toBeUndefined();
  });
});

describe("MarkupSanitizer — configuration", () => {
  it("rejects invalid options with every issue listed", () => {
    let caught: unknown;
    try {
      new MarkupSanitizer({ maxInputLength: 0 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SanitizeConfigurationError);
    if (!(caught instanceof SanitizeConfigurationError)) return;
    expect(caught.configIssues).toEqual(["maxInputLength: Number must be greater than 0"]);
  });

  it("rejects unknown at-rule types", () => {
    expect(() => parseSanitizerOptions({ allowedAtRules: ["style", "bogus"] })).toThrow(
      SanitizeConfigurationError,
    );
  });

  it("blocks markup longer than maxInputLength", () => {
    const sanitizer = makeSanitizer({ maxInputLength: 10 });

    expect(sanitizer.sanitize("<b>ok</b>")).toBe("<b>ok</b>");
    expect(() => sanitizer.sanitize("<b>too long</b>")).toThrow(SanitizeContentBlockedError);
  });
});

describe("MarkupSanitizer — entry points", () => {
  it("sanitizeDom parses a fragment and returns the document", () => {
    const document = new MarkupSanitizer().sanitizeDom("<svg><script>x</script></svg>");
    expect(document.body.innerHTML).toBe("<svg></svg>");
  });

  it("sanitizeDom works in place on an existing document, scoped to a context", () => {
    const document = createHtmlParser().parseDocument(
      '<div id="a"><i>x</i></div><div id="b"><i>y</i></div>',
    );
    const context = document.querySelector("#a") ?? document.body;

    const result = makeSanitizer().sanitizeDom(document, context);

    expect(result).toBe(document);
    expect(document.body.innerHTML).toBe('<div id="a"></div><div id="b"><i>y</i></div>');
  });

  it("sanitizeDocument serializes the whole document", () => {
    const sanitizer = makeSanitizer({ allowedTags: ["html", "head", "body", "div"] });

    expect(
      sanitizer.sanitizeDocument(
        "<html><head><title>t</title></head><body><div>x</div><script>y</script></body></html>",
      ),
    ).toBe("<html><head></head><body><div>x</div></body></html>");
  });

  it("writes document type identifiers back", () => {
    const sanitizer = makeSanitizer({ allowedTags: ["html", "head", "body", "div"] });

    expect(
      sanitizer.sanitizeDocument(
        '<!DOCTYPE html PUBLIC "-//W3C//DTD HTML 4.01//EN" "http://www.w3.org/TR/html4/strict.dtd"><div>x</div>',
      ),
    ).toBe(
      '<!DOCTYPE html PUBLIC "-//W3C//DTD HTML 4.01//EN" "http://www.w3.org/TR/html4/strict.dtd"><html><head></head><body><div>x</div></body></html>',
    );
    expect(sanitizer.sanitizeDocument('<!DOCTYPE html SYSTEM "about:legacy-compat"><div>x</div>')).toBe(
      '<!DOCTYPE html SYSTEM "about:legacy-compat"><html><head></head><body><div>x</div></body></html>',
    );
    expect(sanitizer.sanitizeDocument("<!DOCTYPE html><div>x</div>")).toBe(
      "<!DOCTYPE html><html><head></head><body><div>x</div></body></html>",
    );
  });

  it("accepts a formatter per call", () => {
    const sanitizer = makeSanitizer({ allowedTags: ["br"] });

    expect(sanitizer.sanitize("<br>")).toBe("<br>");
    expect(sanitizer.sanitize("<br>", "", xmlFormatter)).toBe(
      '<br xmlns="http://www.w3.org/1999/xhtml" />',
    );
  });
});

describe("MarkupSanitizer — failures", () => {
  it("wraps failures that are not hook errors in InternalError", () => {
    const sanitizer = makeSanitizer();
    sanitizer.hooks.intercept("PostProcessNode", (data) =>
      isText(data.node)
        ? { action: "modify", data: { ...data, replacementNodes: [data.document.body] } }
        : { action: "continue" },
    );

    expect(() => sanitizer.sanitize("<div>x</div>")).toThrow(InternalError);
  });
});

describe("MarkupSanitizer — XML", () => {
  it("sanitizes SVG documents with the XML parser and serializer", () => {
    const sanitizer = new MarkupSanitizer({
      parser: createXmlParser("image/svg+xml"),
      formatter: xmlFormatter,
    });

    expect(
      sanitizer.sanitize(
        '<svg xmlns="http://www.w3.org/2000/svg"><script>alert(1)</script><circle cx="1"/></svg>',
      ),
    ).toBe('<svg xmlns="http://www.w3.org/2000/svg"><circle cx="1"/></svg>');
  });
});

describe("MarkupSanitizer — report", () => {
  it("lists every applied removal in order", () => {
    const report = new MarkupSanitizer().sanitizeWithReport(END_TO_END_SVG);

    expect(report).toEqual({
      original: END_TO_END_SVG,
      clean: '<svg><circle cx="1"></circle></svg>',
      removals: [
        { subject: "tag", tag: "script", name: "script", reason: "not-allowed-tag" },
        { subject: "style", tag: "circle", name: "fill", reason: "not-allowed-url-value" },
        { subject: "attribute", tag: "circle", name: "style", reason: "style-attribute-empty" },
      ],
      safe: false,
    });
    expect(Object.isFrozen(report)).toBe(true);
  });

  it("is safe when nothing was removed", () => {
    const report = new MarkupSanitizer().sanitizeWithReport('<svg><circle cx="1"></circle></svg>');

    expect(report.safe).toBe(true);
    expect(report.removals).toEqual([]);
  });

  it("records at-rule and comment removals", () => {
    const report = makeSanitizer().sanitizeWithReport(
      "<style>@import url(e.css);</style><!--c-->",
    );

    expect(report.removals).toEqual([
      { subject: "at-rule", tag: "style", name: "@import url(e.css)", reason: undefined },
      { subject: "comment", tag: undefined, name: "c", reason: undefined },
    ]);
  });

  it("leaves out removals a hook canceled", () => {
    const sanitizer = makeSanitizer();
    sanitizer.hooks.intercept("RemovingTag", () => ({ action: "block", reason: "keep" }));

    const report = sanitizer.sanitizeWithReport("<i>x</i>");

    expect(report.clean).toBe("<i>x</i>");
    expect(report.safe).toBe(true);
  });
});
