import { describe, expect, it } from "vitest";
import { extractJsonObject } from "./json.js";

describe("extractJsonObject", () => {
  it("parses a clean object", () => {
    expect(extractJsonObject('{"action":"health"}')).toEqual({ action: "health" });
  });

  it("pulls the object out of fenced or chatty output", () => {
    const raw = 'Sure!\n```json\n{"action":"metrics","need_tools":true}\n```';
    expect(extractJsonObject(raw)).toEqual({ action: "metrics", need_tools: true });
  });

  it("returns null for text without an object", () => {
    expect(extractJsonObject("not json")).toBeNull();
    expect(extractJsonObject("   ")).toBeNull();
  });

  it("returns null when the braces do not hold valid JSON", () => {
    expect(extractJsonObject("{action: health}")).toBeNull();
  });

  it("ignores top-level arrays and scalars", () => {
    expect(extractJsonObject("[1,2]")).toBeNull();
    expect(extractJsonObject("42")).toBeNull();
  });
});
