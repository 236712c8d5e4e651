/**
 * @multiledger/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { LedgerExtensions } from "@multiledger/ledger";

// =============================================================================
// Schema
// =============================================================================

const uint = z.string().regex(/^(0|[1-9]\d*)$/, "expected an unsigned integer");

const flag = z
  .string()
  .transform((v) => v === "true")
  .default("false");

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Identities
  LEDGER_ACCOUNT_ID: z.string().min(1).default("ledger"),
  LEDGER_ADMIN_ID: z.string().min(1).optional(),

  // Extensions
  METADATA_EXTENSION: flag,
  APPROVAL_EXTENSION: flag,
  ENUMERATION_EXTENSION: flag,

  // Payments
  PAYMENT_FLOOR: uint.default("1").transform((v) => BigInt(v)),
  STORAGE_BYTE_COST: uint.default("10000000000000000000").transform((v) => BigInt(v)),

  // Compute
  COMPUTE_FOR_TRANSFER_CALL: uint.default("30000000000000").transform((v) => BigInt(v)),
  COMPUTE_FOR_RESOLVE: uint.default("5000000000000").transform((v) => BigInt(v)),

  // Persistence
  SETTLEMENT_LOG_PATH: z.string().min(1).optional(),
  LEDGER_STATE_PATH: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Settings
// =============================================================================

export function extensionsFromConfig(config: AppConfig): LedgerExtensions {
  return {
    metadata: config.METADATA_EXTENSION,
    approvals: config.APPROVAL_EXTENSION,
    enumeration: config.ENUMERATION_EXTENSION,
  };
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
