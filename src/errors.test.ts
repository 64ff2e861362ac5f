import { describe, expect, it } from "vitest";
import {
  RenderError,
  ScopeError,
  SiteIndexError,
  StorageError,
  toErrorPayload,
} from "./errors.js";

describe("toErrorPayload", () => {
  it("keeps the kind of documentation errors", () => {
    expect(toErrorPayload(new SiteIndexError(3, 1))).toEqual({
      kind: "IndexError",
      message: "Documentation index 3 is out of range: expected an integer from 0 to 0",
    });
    expect(toErrorPayload(new ScopeError("https://b.com/x", "https://a.com/"))).toEqual({
      kind: "ScopeError",
      message: "URL https://b.com/x is outside the documentation site https://a.com/",
    });
    expect(toErrorPayload(new StorageError("disk full"))).toEqual({
      kind: "StorageError",
      message: "disk full",
    });
  });

  it("adds the reason of render errors", () => {
    expect(toErrorPayload(new RenderError("Timeout", "https://a.com/", "too slow"))).toEqual({
      kind: "RenderError",
      reason: "Timeout",
      message: "too slow",
    });
  });

  it("reports anything else as an internal error", () => {
    expect(toErrorPayload(new Error("boom"))).toEqual({ kind: "InternalError", message: "boom" });
    expect(toErrorPayload("plain")).toEqual({ kind: "InternalError", message: "plain" });
  });

  it("names errors after their class", () => {
    expect(new RenderError("InvalidContent", "u", "m").name).toBe("RenderError");
  });
});
