import { describe, it, expect } from "vitest";
import { loadEnv } from "./env.js";

describe("loadEnv", () => {
  it("fills defaults", () => {
    expect(loadEnv({})).toEqual({
      port: 3001,
      host: "0.0.0.0",
      corsOrigin: "*",
      maxBodyBytes: 20_000_000,
      analyzeTimeoutMs: 30_000,
      nodeEnv: "development",
    });
  });

  it("reads overrides", () => {
    const env = loadEnv({ PORT: "8080", CORS_ORIGIN: "http://localhost:5173", ANALYZE_TIMEOUT_MS: "0" });
    expect(env.port).toBe(8080);
    expect(env.corsOrigin).toBe("http://localhost:5173");
    expect(env.analyzeTimeoutMs).toBe(0);
  });

  it("rejects bad integers", () => {
    expect(() => loadEnv({ PORT: "-1" })).toThrow('PORT: expected a non-negative integer, got "-1"');
  });
});
