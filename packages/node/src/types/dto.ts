/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 *
 * Amounts travel as base-unit integer strings and come out as bigint;
 * addresses come out checksummed.
 */

import { z } from "zod";
import { toPrincipal } from "@breakwater/ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PrincipalSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "must be a 0x-prefixed 20-byte hex address")
  .transform((value) => toPrincipal(value));

export const AmountSchema = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, "must be a base-unit integer string")
  .transform((value) => BigInt(value));

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Token DTOs
// =============================================================================

export const AmountBodySchema = z.object({
  amount: AmountSchema,
});

export type AmountBodyDto = z.infer<typeof AmountBodySchema>;

export const ApproveSchema = z.object({
  spender: PrincipalSchema,
  amount: AmountSchema,
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

export const TransferSchema = z.object({
  to: PrincipalSchema,
  amount: AmountSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const TransferFromSchema = z.object({
  from: PrincipalSchema,
  to: PrincipalSchema,
  amount: AmountSchema,
});

export type TransferFromDto = z.infer<typeof TransferFromSchema>;

// =============================================================================
// Underlying DTOs
// =============================================================================

export const FaucetSchema = z.object({
  /** Defaults to the caller */
  to: PrincipalSchema.optional(),
  amount: AmountSchema,
});

export type FaucetDto = z.infer<typeof FaucetSchema>;

// =============================================================================
// Liquidation DTOs
// =============================================================================

export const InitiateLiquidationSchema = z.object({
  principal: PrincipalSchema,
});

export type InitiateLiquidationDto = z.infer<typeof InitiateLiquidationSchema>;

// =============================================================================
// Lending DTOs
// =============================================================================

export const HealthFactorSchema = z.object({
  borrower: PrincipalSchema,
  /** Fixed-point, 1e18 = 1.0 */
  healthFactor: AmountSchema,
});

export type HealthFactorDto = z.infer<typeof HealthFactorSchema>;

export const LendingInitiateSchema = z.object({
  borrower: PrincipalSchema,
});

export type LendingInitiateDto = z.infer<typeof LendingInitiateSchema>;

export const LendingLiquidateSchema = z.object({
  borrower: PrincipalSchema,
  amount: AmountSchema,
  /** Defaults to the caller */
  recipient: PrincipalSchema.optional(),
});

export type LendingLiquidateDto = z.infer<typeof LendingLiquidateSchema>;

// =============================================================================
// Clock DTOs
// =============================================================================

export const AdvanceTicksSchema = z.object({
  ticks: z.number().int().min(1).max(1_000_000).default(1),
});

export type AdvanceTicksDto = z.infer<typeof AdvanceTicksSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
