// src/lib/__tests__/config.test.ts
import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { loadConfig, DEFAULT_CONFIG } from "../config.js";
import { InvalidConfigError } from "../errors.js";

describe("loadConfig", () => {
  it("returns defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.port).toBe(8000);
    expect(config.host).toBe("0.0.0.0");
    expect(config.toolBin).toBe("dr");
    expect(config.toolSubcommand).toBe("mup1cc");
    expect(config.timeoutMs).toBe(30_000);
    expect(config.corsOrigins).toEqual(["*"]);
  });

  it("points the default page directory at the package's public/ dir", () => {
    expect(path.basename(DEFAULT_CONFIG.publicDir)).toBe("public");
  });

  it("reads values from the environment", () => {
    const config = loadConfig({
      MUP1_GATEWAY_PORT: "9000",
      MUP1_GATEWAY_TOOL: "/opt/dr/bin/dr",
      MUP1_GATEWAY_TIMEOUT_MS: "5000",
      MUP1_GATEWAY_CORS_ORIGINS: "http://a.local, http://b.local,",
    });
    expect(config.port).toBe(9000);
    expect(config.toolBin).toBe("/opt/dr/bin/dr");
    expect(config.timeoutMs).toBe(5000);
    expect(config.corsOrigins).toEqual(["http://a.local", "http://b.local"]);
  });

  it("ignores empty environment values", () => {
    expect(loadConfig({ MUP1_GATEWAY_HOST: "" }).host).toBe("0.0.0.0");
  });

  it("lets overrides win over the environment", () => {
    const config = loadConfig(
      { MUP1_GATEWAY_PORT: "9000", MUP1_GATEWAY_HOST: "127.0.0.1" },
      { port: "9100", host: undefined },
    );
    expect(config.port).toBe(9100);
    expect(config.host).toBe("127.0.0.1");
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ MUP1_GATEWAY_PORT: "http" })).toThrow(InvalidConfigError);
  });

  it("names every invalid key", () => {
    try {
      loadConfig({}, { port: 70_000, timeoutMs: -1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      const message = err instanceof Error ? err.message : "";
      expect(message).toMatch(/^Invalid configuration: /);
      expect(message).toContain("port:");
      expect(message).toContain("timeoutMs:");
    }
  });

  it("sets the error code", () => {
    try {
      loadConfig({}, { corsOrigins: [] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      if (err instanceof InvalidConfigError) expect(err.code).toBe("INVALID_CONFIG");
    }
  });
});
