/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Quantities
 * travel as base-10 digit strings and come out of the schemas as bigint.
 */

import { z } from "zod";
import { isAddress, isLedgerEventType, isU64String } from "@ballast/types";
import type { LedgerEventType } from "@ballast/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const U64Schema = z
  .string()
  .refine(isU64String, { message: "Must be an unsigned 64-bit integer string" })
  .transform((v) => BigInt(v));

export const AddressSchema = z
  .string()
  .max(256)
  .refine(isAddress, { message: "Must be a non-empty address" });

export const TimestampSchema = z.string().datetime({ offset: true });

export const CollateralEntrySchema = z.object({
  assetId: z.string().min(1).max(128),
  description: z.string().max(1024),
  value: U64Schema,
});

export const CollateralColumnsSchema = z.object({
  assetIds: z.array(z.string()),
  descriptions: z.array(z.string()),
  values: z.array(U64Schema),
});

// =============================================================================
// Ledger DTOs
// =============================================================================

export const InitializeLedgerSchema = z
  .object({
    collateral: z.array(CollateralEntrySchema).optional(),
    collateralColumns: CollateralColumnsSchema.optional(),
    initialSupply: U64Schema,
    oracleInitialValue: U64Schema,
    governanceAddress: AddressSchema,
    owner: AddressSchema,
    timestamp: TimestampSchema.optional(),
  })
  .refine((b) => (b.collateral === undefined) !== (b.collateralColumns === undefined), {
    message: "Provide exactly one of collateral or collateralColumns",
    path: ["collateral"],
  });

export type InitializeLedgerDto = z.infer<typeof InitializeLedgerSchema>;

export const IssueSchema = z.object({
  additionalCollateralValue: U64Schema,
  amount: U64Schema,
  recipient: AddressSchema,
  assetId: z.string().min(1).max(128).optional(),
  description: z.string().max(1024).optional(),
});

export type IssueDto = z.infer<typeof IssueSchema>;

export const RedeemSchema = z.object({
  burnAmount: U64Schema,
  collateralValueReduction: U64Schema,
});

export type RedeemDto = z.infer<typeof RedeemSchema>;

export const TransferSchema = z.object({
  to: AddressSchema,
  amount: U64Schema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const ValuationSchema = z.object({
  value: U64Schema,
  timestamp: TimestampSchema.optional(),
});

export type ValuationDto = z.infer<typeof ValuationSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  type: z
    .custom<LedgerEventType>(isLedgerEventType, { message: "Unknown event type" })
    .optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
