import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "../infra/errors.js";
import { resolveSecret } from "./secrets.js";

describe("resolveSecret", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("returns the trimmed env value", () => {
    vi.stubEnv("OPS_TEST_CLIENT_SECRET", "  test-secret \n");
    expect(resolveSecret("OPS_TEST_CLIENT_SECRET")).toBe("test-secret");
  });

  it("treats unset and blank values as missing", () => {
    vi.stubEnv("OPS_TEST_BLANK", "   ");
    expect(resolveSecret("OPS_TEST_BLANK")).toBeUndefined();
    expect(resolveSecret("OPS_TEST_NEVER_SET_XYZ")).toBeUndefined();
  });

  it("rejects names that are not env var references", () => {
    for (const name of ["gemini-key", "1_TENANT", "", "HAS SPACE"]) {
      expect(() => resolveSecret(name)).toThrow(ConfigError);
    }
    expect(() => resolveSecret("lower")).toThrow(/Invalid env var name: "lower"/);
  });
});
