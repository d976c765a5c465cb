/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Decimal string in asset units: "100", "0.5", "12.345678" */
export const AmountSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal string");

const OwnerSchema = z.string().min(1).max(128);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Vault DTOs
// =============================================================================

export const DepositSchema = z.object({
  owner: OwnerSchema,
  amount: AmountSchema,
  /** Longer lockup for this deposit, in milliseconds */
  lockupMs: z.number().int().min(0).optional(),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  owner: OwnerSchema,
  shares: AmountSchema,
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const ListWithdrawalsQuerySchema = PaginationQuerySchema.extend({
  owner: OwnerSchema.optional(),
});

export type ListWithdrawalsQuery = z.infer<typeof ListWithdrawalsQuerySchema>;

export const RebalanceSchema = z.object({
  reason: z.string().min(1).max(256).default("api"),
});

export type RebalanceDto = z.infer<typeof RebalanceSchema>;

export const EmergencyShutdownSchema = z.object({
  reason: z.string().min(1).max(1024),
});

export type EmergencyShutdownDto = z.infer<typeof EmergencyShutdownSchema>;

// =============================================================================
// Strategy DTOs
// =============================================================================

export const RecordReturnSchema = z.object({
  /** Period return as a fraction (0.001 = 0.1%) */
  value: z.number().finite().min(-1),
});

export type RecordReturnDto = z.infer<typeof RecordReturnSchema>;

export const DisableStrategySchema = z.object({
  reason: z.string().min(1).max(1024),
});

export type DisableStrategyDto = z.infer<typeof DisableStrategySchema>;

// =============================================================================
// Bridge DTOs
// =============================================================================

export const ListTransfersQuerySchema = PaginationQuerySchema.extend({
  state: z
    .enum(["initiated", "submitted", "pending_confirmation", "confirmed", "failed", "refunded"])
    .optional(),
});

export type ListTransfersQuery = z.infer<typeof ListTransfersQuerySchema>;
