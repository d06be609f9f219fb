/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Request schemas only check shape; byte lengths, addresses and the stake
 * unit are enforced by the lifecycle package so the HTTP layer and direct
 * callers fail the same way. Amounts travel as decimal wei strings.
 */

import { z } from "zod";
import type { CustodyBalances, ReconciliationResult } from "@stakegate/custody";
import type { DepositRecord, ExitRequest } from "@stakegate/lifecycle";

// =============================================================================
// Shared Schemas
// =============================================================================

export const WeiSchema = z
  .string()
  .regex(/^\d+$/, "Expected a decimal amount in wei");

export const HexSchema = z.string().min(1);

export const IdParamSchema = z.coerce.number().int().positive();

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Deposit DTOs
// =============================================================================

export const CreateDepositSchema = z.object({
  withdrawalAddress: z.string().optional(),
  amount: WeiSchema,
});

export type CreateDepositDto = z.infer<typeof CreateDepositSchema>;

export const AssignDepositSchema = z.object({
  pubkey: HexSchema,
  signature: HexSchema,
});

export type AssignDepositDto = z.infer<typeof AssignDepositSchema>;

export const ConfirmDepositSchema = z.object({
  depositDataRoot: HexSchema,
});

export type ConfirmDepositDto = z.infer<typeof ConfirmDepositSchema>;

export const TransferHandleSchema = z.object({
  to: z.string().min(1),
});

export type TransferHandleDto = z.infer<typeof TransferHandleSchema>;

export const ListDepositsQuerySchema = PaginationQuerySchema.extend({
  state: z.enum(["requested", "assigned", "confirmed", "finalized"]).optional(),
});

export type ListDepositsQuery = z.infer<typeof ListDepositsQuerySchema>;

// =============================================================================
// Operator DTOs
// =============================================================================

export const SetOperatorSchema = z.object({
  enabled: z.boolean(),
});

export type SetOperatorDto = z.infer<typeof SetOperatorSchema>;

// =============================================================================
// Vault DTOs
// =============================================================================

export const RequestVaultDepositSchema = z.object({
  controller: z.string().optional(),
  amount: WeiSchema,
});

export type RequestVaultDepositDto = z.infer<typeof RequestVaultDepositSchema>;

export const ProcessVaultDepositSchema = ConfirmDepositSchema;

export const RequestRedeemSchema = z.object({
  validatorId: z.number().int().positive(),
  controller: z.string().optional(),
  owner: z.string().optional(),
});

export type RequestRedeemDto = z.infer<typeof RequestRedeemSchema>;

export const ProcessRedeemSchema = z.object({
  exitEpoch: z.number().int().min(0),
});

export type ProcessRedeemDto = z.infer<typeof ProcessRedeemSchema>;

export const ListRequestsQuerySchema = PaginationQuerySchema.extend({
  kind: z.enum(["deposit", "redeem"]).optional(),
  state: z.enum(["pending", "processing", "claimable", "claimed", "cancelled"]).optional(),
});

export type ListRequestsQuery = z.infer<typeof ListRequestsQuerySchema>;

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

// =============================================================================
// Response DTOs
// =============================================================================

export type DepositRecordDto = Omit<DepositRecord, "amount"> & { readonly amount: string };

export type ExitRequestDto = Omit<ExitRequest, "amount"> & { readonly amount: string };

export function toDepositRecordDto(record: DepositRecord): DepositRecordDto {
  return { ...record, amount: record.amount.toString() };
}

export function toExitRequestDto(request: ExitRequest): ExitRequestDto {
  return { ...request, amount: request.amount.toString() };
}

export function toBalancesDto(balances: CustodyBalances): Record<string, string> {
  return Object.fromEntries(
    Object.entries(balances).map(([counter, value]) => [counter, value.toString()]),
  );
}

export interface ReconciliationDto {
  readonly matched: boolean;
  readonly expected: string;
  readonly actual: string;
  readonly difference: string;
}

export function toReconciliationDto(result: ReconciliationResult): ReconciliationDto {
  return {
    matched: result.matched,
    expected: result.expected.toString(),
    actual: result.actual.toString(),
    difference: result.difference.toString(),
  };
}
