import path from "path";
import { describe, expect, it } from "vitest";
import { loadServerConfig, parseBoolean, parseNumber, sweepIntervalTicks } from "./config";

describe("config", () => {
  it("parses numbers with a fallback", () => {
    expect(parseNumber("42", 7)).toBe(42);
    expect(parseNumber("1.5", 7)).toBe(1.5);
    expect(parseNumber(undefined, 7)).toBe(7);
    expect(parseNumber("", 7)).toBe(7);
    expect(parseNumber("ten", 7)).toBe(7);
  });

  it("parses booleans with a fallback", () => {
    expect(parseBoolean("true", false)).toBe(true);
    expect(parseBoolean("TRUE", false)).toBe(true);
    expect(parseBoolean("1", false)).toBe(true);
    expect(parseBoolean("yes", true)).toBe(false);
    expect(parseBoolean(undefined, true)).toBe(true);
  });

  it("fills every setting with its default", () => {
    expect(loadServerConfig({})).toEqual({
      port: 8888,
      useHttps: false,
      sslCertPath: undefined,
      sslKeyPath: undefined,
      tickMs: 600,
      disengageSeconds: 10,
      sweepIntervalMs: 1000,
      engagementOnTargeted: false,
      attackIntervalTicks: 4,
      jwtSecret: "dev-secret-change-me",
      staticAssetsPath: undefined,
      intentAudit: {
        enabled: false,
        dbPath: path.resolve(process.cwd(), "logs", "intent-audit.sqlite"),
        batchSize: 200,
        flushMs: 2000,
        dedupWindowMs: 60000
      }
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadServerConfig({
      PORT: "9000",
      TICK_MS: "100",
      DISENGAGE_SECONDS: "6",
      ENGAGEMENT_ON_TARGETED: "true",
      ATTACK_INTERVAL_TICKS: "2.7",
      JWT_SECRET: "test-secret",
      INTENT_AUDIT_ENABLED: "1",
      INTENT_AUDIT_PATH: ":memory:"
    });

    expect(config).toMatchObject({
      port: 9000,
      tickMs: 100,
      disengageSeconds: 6,
      engagementOnTargeted: true,
      attackIntervalTicks: 2,
      jwtSecret: "test-secret"
    });
    expect(config.intentAudit).toMatchObject({ enabled: true, dbPath: ":memory:" });
  });

  it("clamps values that would break the tick", () => {
    const config = loadServerConfig({ TICK_MS: "0", DISENGAGE_SECONDS: "-5", ATTACK_INTERVAL_TICKS: "0" });
    expect(config.tickMs).toBe(1);
    expect(config.disengageSeconds).toBe(0);
    expect(config.attackIntervalTicks).toBe(1);
  });

  it("converts the sweep interval to ticks", () => {
    expect(sweepIntervalTicks({ tickMs: 600, sweepIntervalMs: 1000 })).toBe(2);
    expect(sweepIntervalTicks({ tickMs: 600, sweepIntervalMs: 100 })).toBe(1);
    expect(sweepIntervalTicks({ tickMs: 100, sweepIntervalMs: 1000 })).toBe(10);
  });
});
