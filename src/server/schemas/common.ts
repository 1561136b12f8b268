/**
 * Common TypeBox schemas for API validation
 */

import { Type, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

export const DateTimeSchema = Type.String({ format: "date-time" });

export const NullableDateTimeSchema = Type.Union([DateTimeSchema, Type.Null()]);

export const SchedulerStateSchema = Type.Union([
  Type.Literal("IDLE"),
  Type.Literal("FETCHING"),
  Type.Literal("PARSING"),
  Type.Literal("RECONCILING"),
  Type.Literal("DIFFING"),
  Type.Literal("WRITING"),
  Type.Literal("SLEEPING"),
  Type.Literal("STOPPED"),
]);

export const CycleOutcomeSchema = Type.Union([
  Type.Literal("SUCCEEDED"),
  Type.Literal("FAILED"),
  Type.Literal("CANCELLED"),
]);
