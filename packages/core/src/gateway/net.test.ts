import { describe, expect, it } from "vitest";
import { resolveAllowedOrigin, resolveBindHost } from "./net.js";

describe("resolveBindHost", () => {
  it("maps bind modes to addresses", () => {
    expect(resolveBindHost("loopback")).toBe("127.0.0.1");
    expect(resolveBindHost("lan")).toBe("0.0.0.0");
    expect(resolveBindHost("custom", " 10.0.0.5 ")).toBe("10.0.0.5");
    expect(resolveBindHost("custom")).toBe("0.0.0.0");
  });
});

describe("resolveAllowedOrigin", () => {
  it("allows everything with a wildcard", () => {
    expect(resolveAllowedOrigin("https://ops.example.test", ["*"])).toBe("*");
    expect(resolveAllowedOrigin(undefined, ["*"])).toBe("*");
  });

  it("echoes a listed origin and rejects others", () => {
    const allowed = ["https://ops.example.test"];
    expect(resolveAllowedOrigin("https://ops.example.test", allowed)).toBe("https://ops.example.test");
    expect(resolveAllowedOrigin("https://evil.example.test", allowed)).toBeUndefined();
    expect(resolveAllowedOrigin(undefined, allowed)).toBeUndefined();
  });
});
