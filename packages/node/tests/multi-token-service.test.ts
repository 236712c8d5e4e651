import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFileSync, mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import { loadConfig } from "../src/config.js";
import { MultiTokenService } from "../src/services/multi-token-service.js";

const logger = pino({ level: "silent" });

const transferCall = { caller: "alice", attachedPayment: 1n, prepaidCompute: 40_000_000_000_000n };

describe("MultiTokenService", () => {
  it("wires the ledger from configuration", () => {
    const service = new MultiTokenService(
      loadConfig({ LEDGER_ACCOUNT_ID: "mt.test", LEDGER_ADMIN_ID: "admin", APPROVAL_EXTENSION: "true" }),
      logger,
    );

    expect(service.ledger.accountId).toBe("mt.test");
    expect(service.ledger.adminId).toBe("admin");
    expect(service.ledger.extensions.approvals).toBe(true);
    expect(service.settlement.limits.computeForResolve).toBe(5_000_000_000_000n);
  });

  it("charges storage at the configured byte cost", () => {
    const service = new MultiTokenService(loadConfig({ STORAGE_BYTE_COST: "1" }), logger);

    service.ledger.mint(
      { caller: "ledger", attachedPayment: 10_000n },
      { ownerId: "alice", amount: 1000n, refundRecipient: "alice" },
    );

    const [payout] = service.payments.payouts;
    expect(payout?.recipientId).toBe("alice");
    expect(payout?.amount).toBeLessThan(10_000n);
  });

  it("settles a transfer-call through a registered receiver", async () => {
    const service = new MultiTokenService(loadConfig({}), logger);
    service.ledger.mint({ caller: "ledger" }, { ownerId: "alice", amount: 1000n });
    service.ledger.register({ caller: "vault" }, "1");
    service.registerReceiver("vault", () => ["25"]);

    service.settlement.transferCall(transferCall, {
      receiverId: "vault",
      tokenId: "1",
      amount: 100n,
      message: "deposit",
    });

    expect(await service.settle()).toBe(2);
    expect(service.ledger.balanceOf("alice", "1")).toBe(925n);
    expect(service.verifyIntegrity().valid).toBe(true);
  });

  describe("with persistent stores", () => {
    let testDir: string;

    beforeEach(() => {
      testDir = join(tmpdir(), `multiledger-node-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
      mkdirSync(testDir, { recursive: true });
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it("finishes open settlements on start", async () => {
      const config = loadConfig({
        SETTLEMENT_LOG_PATH: join(testDir, "events.jsonl"),
        LEDGER_STATE_PATH: join(testDir, "ledger.json"),
      });

      const first = new MultiTokenService(config, logger);
      first.ledger.mint({ caller: "ledger" }, { ownerId: "alice", amount: 1000n });
      first.ledger.register({ caller: "vault" }, "1");
      const { settlementId } = first.settlement.transferCall(transferCall, {
        receiverId: "vault",
        tokenId: "1",
        amount: 100n,
        message: "deposit",
      });

      const second = new MultiTokenService(config, logger);
      const resumed = await second.start();

      expect(resumed).toEqual([settlementId]);
      expect(second.ledger.balanceOf("alice", "1")).toBe(1000n);
      expect(second.settlement.settlement(settlementId)?.state).toBe("resolved");
    });

    it("recovers after a crash tore the last line of the event log", async () => {
      const logPath = join(testDir, "events.jsonl");
      const config = loadConfig({
        SETTLEMENT_LOG_PATH: logPath,
        LEDGER_STATE_PATH: join(testDir, "ledger.json"),
      });

      const first = new MultiTokenService(config, logger);
      first.ledger.mint({ caller: "ledger" }, { ownerId: "alice", amount: 1000n });
      first.ledger.register({ caller: "vault" }, "1");
      const { settlementId } = first.settlement.transferCall(transferCall, {
        receiverId: "vault",
        tokenId: "1",
        amount: 100n,
        message: "deposit",
      });
      appendFileSync(logPath, '{"event":{"type":"settlement.notif', "utf-8");

      const second = new MultiTokenService(config, logger);
      expect(await second.start()).toEqual([settlementId]);

      const third = new MultiTokenService(config, logger);
      expect(third.verifyIntegrity().valid).toBe(true);
      expect(third.settlement.settlement(settlementId)?.state).toBe("resolved");
      expect(third.ledger.balanceOf("alice", "1")).toBe(1000n);
      expect(third.ledger.balanceOf("vault", "1")).toBe(0n);
    });
  });
});
