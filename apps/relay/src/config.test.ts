/**
 * Tests for relay configuration.
 */

import { describe, it, expect } from "vitest";
import { ConfigError, expandCorsOrigins, loadConfig } from "./config.js";

describe("expandCorsOrigins", () => {
  it("should add the www variant of a public origin", () => {
    expect(expandCorsOrigins("https://show.example")).toEqual([
      "https://show.example",
      "https://www.show.example",
    ]);
  });

  it("should add the bare variant of a www origin", () => {
    expect(expandCorsOrigins("https://www.show.example")).toEqual([
      "https://www.show.example",
      "https://show.example",
    ]);
  });

  it("should leave local origins alone and trim entries", () => {
    expect(expandCorsOrigins(" http://localhost:3000 , http://127.0.0.1:8080,")).toEqual([
      "http://localhost:3000",
      "http://127.0.0.1:8080",
    ]);
  });

  it("should not repeat an origin listed in both forms", () => {
    expect(expandCorsOrigins("https://show.example,https://www.show.example")).toEqual([
      "https://show.example",
      "https://www.show.example",
    ]);
  });
});

describe("loadConfig", () => {
  it("should fall back to defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.port).toBe(3001);
    expect(config.corsOrigins).toEqual(["http://localhost:3000"]);
    expect(config.fppBaseUrl).toBe("http://127.0.0.1");
    expect(config.audioDir).toBe("/home/fpp/media/audio-fseq");
    expect(config.statusPollMs).toBe(250);
    expect(config.statusTimeoutMs).toBe(500);
    expect(config.frameRate).toBe(40);
    expect(config.defaultChannels).toBe(2206);
    expect(config.estimator).toEqual({
      hardSeekThresholdMs: 1000,
      hardSeekCooldownMs: 2000,
      deadbandMs: 500,
      maxRateAdjust: 0.02,
    });
  });

  it("should coerce numeric variables and strip the trailing slash of the base URL", () => {
    const config = loadConfig({
      PORT: "8080",
      FPP_BASE_URL: "http://fpp.local/",
      FRAME_RATE: "20",
      DEADBAND_MS: "250",
    });

    expect(config.port).toBe(8080);
    expect(config.fppBaseUrl).toBe("http://fpp.local");
    expect(config.frameRate).toBe(20);
    expect(config.estimator.deadbandMs).toBe(250);
  });

  it("should reject an invalid port", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(
      /^Invalid relay configuration: PORT:/
    );
  });

  it("should reject a frame rate above 100", () => {
    expect(() => loadConfig({ FRAME_RATE: "250" })).toThrow(/FRAME_RATE/);
  });
});
