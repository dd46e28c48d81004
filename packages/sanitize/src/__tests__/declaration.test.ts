import { describe, expect, it } from "vitest";
import type { StyleDeclaration } from "../css/declaration.js";
import { parseInlineStyle } from "../filters/style.js";

function parse(value: string): StyleDeclaration {
  const styles = parseInlineStyle(value);
  if (styles === undefined) throw new Error(`unparseable style: ${value}`);
  return styles;
}

describe("parseInlineStyle", () => {
  it("lists properties in source order", () => {
    const styles = parse("color: red; fill: blue !important");

    expect(styles.length).toBe(2);
    expect(styles.properties()).toEqual([
      { name: "color", value: "red", important: false },
      { name: "fill", value: "blue", important: true },
    ]);
  });

  it("rejects text that closes the declaration block", () => {
    expect(parseInlineStyle("color: red} b{color: blue")).toBeUndefined();
    expect(parseInlineStyle("color: red; }")).toBeUndefined();
  });
});

describe("StyleDeclaration", () => {
  it("serializes canonically", () => {
    expect(parse("color:red;fill :  blue").toCss()).toBe("color: red; fill: blue");
    expect(parse("color: red !important").toCss()).toBe("color: red !important");
  });

  it("reads values case-insensitively", () => {
    expect(parse("FILL: none").getPropertyValue("fill")).toBe("none");
    expect(parse("color: red").getPropertyValue("fill")).toBe("");
  });

  it("updates an existing property in place", () => {
    const styles = parse("color: red; fill: blue");
    styles.setProperty("COLOR", "green");

    expect(styles.toCss()).toBe("color: green; fill: blue");
  });

  it("keeps the important flag unless told otherwise", () => {
    const styles = parse("color: red !important");
    styles.setProperty("color", "blue");
    expect(styles.toCss()).toBe("color: blue !important");

    styles.setProperty("color", "blue", false);
    expect(styles.toCss()).toBe("color: blue");
  });

  it("appends unknown properties", () => {
    const styles = parse("color: red");
    styles.setProperty("stroke", "black");

    expect(styles.toCss()).toBe("color: red; stroke: black");
  });

  it("removes every declaration of a name", () => {
    const styles = parse("color: red; fill: none; Color: blue");

    expect(styles.removeProperty("color")).toBe("blue");
    expect(styles.toCss()).toBe("fill: none");
  });
});
