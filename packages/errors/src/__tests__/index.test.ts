import { describe, expect, it } from "vitest";
import {
  InternalError,
  PACKAGE_NAME,
  SanitasError,
  SanitizeConfigurationError,
  isSanitasError,
  wrapError,
} from "../index.js";

describe("@sanitas/errors", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@sanitas/errors");
  });

  describe("SanitasError base class", () => {
    it("should create error with message", () => {
      const error = new InternalError("test error");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(SanitasError);
      expect(error.message).toBe("test error");
      expect(error.name).toBe("InternalError");
    });

    it("should preserve stack trace", () => {
      const error = new InternalError("test error");
      expect(error.stack).toBeDefined();
    });

    it("should support metadata and traceId", () => {
      const error = new InternalError("test error", { userId: "123" }, "trace-abc");
      expect(error.metadata).toEqual({ userId: "123" });
      expect(error.traceId).toBe("trace-abc");
    });

    it("should serialize to JSON without empty optional fields", () => {
      const error = new InternalError("boom");
      expect(error.toJSON()).toEqual({
        _tag: "InternalError",
        code: "INTERNAL_ERROR",
        message: "boom",
        httpStatus: 500,
        grpcCode: "INTERNAL",
        domain: "internal",
      });
    });
  });

  describe("wrapError", () => {
    it("returns SanitasError instances unchanged", () => {
      const error = new SanitizeConfigurationError("bad");
      expect(wrapError(error)).toBe(error);
    });

    it("wraps foreign errors in InternalError and keeps the cause", () => {
      const cause = new TypeError("nope");
      const wrapped = wrapError(cause, "trace-1");
      expect(wrapped).toBeInstanceOf(InternalError);
      expect(wrapped.message).toBe("nope");
      expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
      expect(wrapped.traceId).toBe("trace-1");
      expect(wrapped.cause).toBe(cause);
    });

    it("wraps strings and unknown values", () => {
      expect(wrapError("plain").message).toBe("plain");
      expect(wrapError(42).message).toBe("An unknown error occurred");
    });
  });

  it("isSanitasError distinguishes the hierarchy", () => {
    expect(isSanitasError(new InternalError("x"))).toBe(true);
    expect(isSanitasError(new Error("x"))).toBe(false);
  });
});
