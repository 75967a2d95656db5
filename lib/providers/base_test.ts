import { describe, expect, it } from "vitest";
import { debugLoggingEnabled } from "./base.ts";

describe("debugLoggingEnabled", () => {
  it("follows TF_LOG=debug in any case", () => {
    expect(debugLoggingEnabled({ TF_LOG: "DEBUG" })).toBe(true);
    expect(debugLoggingEnabled({ TF_LOG: "debug" })).toBe(true);
  });

  it("is off for other levels", () => {
    expect(debugLoggingEnabled({ TF_LOG: "TRACE" })).toBe(false);
    expect(debugLoggingEnabled({})).toBe(false);
  });
});
