import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({ port: 8787, snapshotPath: null, decompileTimeoutSeconds: 30, maxInstructions: 100 });
  });

  it("reads and coerces the environment", () => {
    expect(loadConfig({
      PORT: "9000",
      BINREPORT_SNAPSHOT: "/srv/programs/hello.json",
      BINREPORT_DECOMPILE_TIMEOUT: "2.5",
      BINREPORT_MAX_INSTRUCTIONS: "20",
    })).toEqual({ port: 9000, snapshotPath: "/srv/programs/hello.json", decompileTimeoutSeconds: 2.5, maxInstructions: 20 });
  });

  it("names the variable that is wrong", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(ConfigError);
    expect(() => loadConfig({ BINREPORT_DECOMPILE_TIMEOUT: "Infinity" }))
      .toThrow("Invalid environment variable BINREPORT_DECOMPILE_TIMEOUT: Number must be finite");
    expect(() => loadConfig({ BINREPORT_MAX_INSTRUCTIONS: "0" }))
      .toThrow("Invalid environment variable BINREPORT_MAX_INSTRUCTIONS: Number must be greater than 0");
  });
});
