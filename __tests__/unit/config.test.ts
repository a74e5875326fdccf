/**
 * Unit tests for config.ts
 */

import { loadConfig } from "../../src/config.js";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.dbPath).toBe("./data/nutri-diary.db");
    expect(config.schemaPath).toBe("./sql/schema.sql");
    expect(config.secureStorePath).toBe("./data/secure-store.json");
    expect(config.logLevel).toBe("info");
    expect(config.off).toEqual({
      enabled: true,
      baseUrl: "https://world.openfoodfacts.org",
      userAgent: "nutri-diary-mcp/1.0 (local diary)",
      productPerMinute: 100,
      searchPerMinute: 10,
      maxConcurrent: 2,
      cacheTtlDays: 7,
      searchPageSize: 30,
    });
  });

  it("should parse flags and numbers and strip the trailing slash", () => {
    const config = loadConfig({
      OFF_ENABLED: "false",
      OFF_BASE_URL: "https://off.example.test/",
      OFF_CACHE_TTL_DAYS: "3",
      LOG_LEVEL: "debug",
    });

    expect(config.off.enabled).toBe(false);
    expect(config.off.baseUrl).toBe("https://off.example.test");
    expect(config.off.cacheTtlDays).toBe(3);
    expect(config.logLevel).toBe("debug");
  });

  it("should reject invalid values", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/^Invalid configuration: LOG_LEVEL/);
    expect(() => loadConfig({ OFF_MAX_CONCURRENT: "0" })).toThrow(/OFF_MAX_CONCURRENT/);
    expect(() => loadConfig({ OFF_ENABLED: "maybe" })).toThrow(/OFF_ENABLED/);
  });
});
