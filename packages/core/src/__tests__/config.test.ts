import { describe, expect, it } from "vitest";
import { defineConfig, parseGatewayConfig, resolveEnvironment } from "../config.js";
import { parseBool } from "../helpers.js";

describe("gateway config", () => {
  it("accepts a typed config unchanged", () => {
    const config = defineConfig({ api: { port: 0 }, web: { enabled: false } });
    expect(parseGatewayConfig(config, "inline")).toEqual({ api: { port: 0 }, web: { enabled: false } });
  });

  it("names the offending keys", () => {
    expect(() => parseGatewayConfig({ extra: true }, "test.config.ts")).toThrow(
      "Invalid config in test.config.ts: (root): Unrecognized key(s) in object: 'extra'"
    );
    expect(() => parseGatewayConfig({ uploads: { ttlMs: -1 } }, "test.config.ts")).toThrow(
      "Invalid config in test.config.ts: uploads.ttlMs: Number must be greater than or equal to 0"
    );
  });

  it("reads gateway settings from the environment", () => {
    expect(
      resolveEnvironment({ KDEPS_MANAGEMENT_TOKEN: "  test-secret ", KDEPS_BIND_HOST: "", DEBUG: "1" })
    ).toEqual({ managementToken: "test-secret", bindHost: null, debug: true });
    expect(resolveEnvironment({ DEBUG: "yes" })).toEqual({ managementToken: null, bindHost: null, debug: false });
  });
});

describe("parseBool", () => {
  it("coerces loose workflow values", () => {
    expect(parseBool("True")).toBe(true);
    expect(parseBool(" no ")).toBe(false);
    expect(parseBool(1)).toBe(true);
    expect(parseBool(2)).toBeNull();
    expect(parseBool("maybe")).toBeNull();
    expect(parseBool(undefined)).toBeNull();
  });
});
