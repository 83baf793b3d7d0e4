/**
 * @breakwater/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { BreakerServiceConfig } from "./services/breaker-service.js";

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "must be a 0x-prefixed 20-byte hex address");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Breaker timing, in ticks
  COOLDOWN_TICKS: z.coerce.bigint().min(1n).default(10n),
  WINDOW_TICKS: z.coerce.bigint().min(1n).default(5n),

  // Deployment
  TOKEN_SYMBOL: z.string().min(1).default("cWBTC"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),
  UNDERLYING_SYMBOL: z.string().min(1).default("WBTC"),
  TOKEN_ADDRESS: AddressSchema.default("0x00000000000000000000000000000000000b4e01"),
  PROTOCOL_ADDRESS: AddressSchema.default("0x00000000000000000000000000000000000b4e02"),

  // Dev networks: advance the clock by one tick every N milliseconds
  AUTO_TICK_MS: z.coerce.number().int().min(10).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * The deployment settings carried by an AppConfig.
 */
export function serviceConfigFrom(config: AppConfig): BreakerServiceConfig {
  return {
    tokenAddress: config.TOKEN_ADDRESS,
    protocolAddress: config.PROTOCOL_ADDRESS,
    tokenSymbol: config.TOKEN_SYMBOL,
    tokenDecimals: config.TOKEN_DECIMALS,
    underlyingSymbol: config.UNDERLYING_SYMBOL,
    cooldownTicks: config.COOLDOWN_TICKS,
    windowTicks: config.WINDOW_TICKS,
  };
}
