import { describe, expect, it } from "vitest";
import { CONTINUE_RESULT, HOOK_PRIORITY } from "../constants.js";
import { makeRegistry, makeScrubData } from "./helpers.js";

describe("HookRegistry — once", () => {
  it("fires once then is removed", () => {
    const registry = makeRegistry();
    let callCount = 0;

    registry.intercept(
      "Scrub",
      () => {
        callCount++;
        return CONTINUE_RESULT;
      },
      { once: true },
    );

    registry.emit("Scrub", makeScrubData());
    registry.emit("Scrub", makeScrubData());

    expect(callCount).toBe(1);
    expect(registry.handlerCount("Scrub")).toBe(0);
  });

  it("disposer before fire prevents execution", () => {
    const registry = makeRegistry();
    let called = false;

    const dispose = registry.intercept(
      "Scrub",
      () => {
        called = true;
        return CONTINUE_RESULT;
      },
      { once: true },
    );

    dispose();
    registry.emit("Scrub", makeScrubData());
    expect(called).toBe(false);
  });

  it("disposer after firing does not remove other handlers", () => {
    const registry = makeRegistry();
    const dispose = registry.intercept("Scrub", () => CONTINUE_RESULT, { once: true });
    registry.intercept("Scrub", () => CONTINUE_RESULT);

    registry.emit("Scrub", makeScrubData());
    dispose();
    expect(registry.handlerCount("Scrub")).toBe(1);
  });

  it("coexists with persistent observers", () => {
    const registry = makeRegistry();
    const calls: string[] = [];

    registry.observe("Audit", () => {
      calls.push("persistent");
    });
    registry.observe(
      "Audit",
      () => {
        calls.push("once");
      },
      { once: true },
    );

    registry.notify("Audit", { count: 1 });
    registry.notify("Audit", { count: 2 });
    expect(calls).toEqual(["persistent", "once", "persistent"]);
    expect(registry.handlerCount("Audit")).toBe(1);
  });

  it("a skipped once handler stays registered", () => {
    const registry = makeRegistry();
    const tags: string[] = [];

    registry.intercept(
      "Scrub",
      (data) => {
        tags.push(data.tag);
        return CONTINUE_RESULT;
      },
      { once: true, match: (data) => data.tag === "img" },
    );

    registry.emit("Scrub", makeScrubData({ tag: "div" }));
    registry.emit("Scrub", makeScrubData({ tag: "img" }));
    registry.emit("Scrub", makeScrubData({ tag: "img" }));
    expect(tags).toEqual(["img"]);
  });
});

describe("HookRegistry — match predicate", () => {
  it("handler skipped when match returns false", () => {
    const registry = makeRegistry();
    let called = false;

    registry.intercept(
      "Scrub",
      () => {
        called = true;
        return { action: "block", reason: "never" };
      },
      { match: () => false },
    );

    expect(registry.emit("Scrub", makeScrubData())).toEqual({ action: "continue" });
    expect(called).toBe(false);
  });

  it("match receives current (waterfalled) data", () => {
    const registry = makeRegistry();
    let matched = "";

    registry.intercept(
      "Scrub",
      (data) => ({ action: "modify", data: { ...data, attribute: "title" } }),
      { priority: HOOK_PRIORITY.HIGH },
    );
    registry.intercept("Scrub", () => CONTINUE_RESULT, {
      priority: HOOK_PRIORITY.LOW,
      match: (data) => {
        matched = data.attribute;
        return true;
      },
    });

    registry.emit("Scrub", makeScrubData());
    expect(matched).toBe("title");
  });

  it("observer match filters notifications", () => {
    const registry = makeRegistry();
    const counts: number[] = [];

    registry.observe("Audit", (data) => counts.push(data.count), {
      match: (data) => data.count > 1,
    });

    registry.notify("Audit", { count: 1 });
    registry.notify("Audit", { count: 2 });
    expect(counts).toEqual([2]);
  });
});
