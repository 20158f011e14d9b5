/**
 * @matchpool/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Chain
  CHAIN_ID: z.string().min(1).default("matchpool-local"),
  ADDRESS_PREFIX: z
    .string()
    .regex(/^[a-z]{1,20}$/, "must be 1-20 lowercase letters")
    .default("wasm"),
  BLOCK_TIME_MS: z.coerce.number().int().min(1).default(5000),

  // Ledger
  GENESIS_BALANCES: z.string().default(""),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Genesis Balance Parsing
// =============================================================================

export interface GenesisBalance {
  readonly address: string;
  readonly denom: string;
  readonly amount: string;
}

const AMOUNT_PATTERN = /^(0|[1-9]\d*)$/;

/**
 * Parse the GENESIS_BALANCES env var into structured records.
 *
 * Format: "address1:denom1:amount1,address2:denom2:amount2"
 */
export function parseGenesisBalances(raw: string): readonly GenesisBalance[] {
  if (raw.trim() === "") {
    return [];
  }

  const balances: GenesisBalance[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    if (parts.length !== 3) {
      throw new Error(
        `Invalid GENESIS_BALANCES entry: "${entry.trim()}". Expected format: address:denom:amount`,
      );
    }

    const [address = "", denom = "", amount = ""] = parts;

    if (address === "") {
      throw new Error("Genesis address cannot be empty");
    }
    if (denom === "") {
      throw new Error(`Denom cannot be empty in GENESIS_BALANCES entry for "${address}"`);
    }
    if (!AMOUNT_PATTERN.test(amount)) {
      throw new Error(
        `Invalid amount "${amount}" in GENESIS_BALANCES. Must be a non-negative integer`,
      );
    }

    balances.push({ address, denom, amount });
  }

  return balances;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
