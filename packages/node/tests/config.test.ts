/**
 * Tests for config.ts — loadConfig + extensionsFromConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { extensionsFromConfig, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.LEDGER_ACCOUNT_ID).toBe("ledger");
    expect(config.LEDGER_ADMIN_ID).toBeUndefined();
    expect(config.PAYMENT_FLOOR).toBe(1n);
    expect(config.COMPUTE_FOR_TRANSFER_CALL).toBe(30_000_000_000_000n);
    expect(config.COMPUTE_FOR_RESOLVE).toBe(5_000_000_000_000n);
    expect(config.SETTLEMENT_LOG_PATH).toBeUndefined();
    expect(config.LEDGER_STATE_PATH).toBeUndefined();
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      LEDGER_ACCOUNT_ID: "mt.example",
      LEDGER_ADMIN_ID: "admin.example",
      PAYMENT_FLOOR: "5",
      STORAGE_BYTE_COST: "340282366920938463463374607431768211455",
      SETTLEMENT_LOG_PATH: "/var/lib/ledger/events.jsonl",
    });
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.LEDGER_ADMIN_ID).toBe("admin.example");
    expect(config.PAYMENT_FLOOR).toBe(5n);
    expect(config.STORAGE_BYTE_COST).toBe(340282366920938463463374607431768211455n);
    expect(config.SETTLEMENT_LOG_PATH).toBe("/var/lib/ledger/events.jsonl");
  });

  it("reads extension flags", () => {
    const config = loadConfig({ METADATA_EXTENSION: "true", APPROVAL_EXTENSION: "yes" });
    expect(extensionsFromConfig(config)).toEqual({
      metadata: true,
      approvals: false,
      enumeration: false,
    });
  });

  it("throws on invalid amounts", () => {
    expect(() => loadConfig({ PAYMENT_FLOOR: "-1" })).toThrow(ZodError);
    expect(() => loadConfig({ COMPUTE_FOR_RESOLVE: "1e12" })).toThrow(ZodError);
  });

  it("throws on an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });
});
