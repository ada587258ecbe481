/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static } from "@sinclair/typebox";

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
// Response Schemas
// ============================================================================

export const MessageResponseSchema = Type.Object({
  status: Type.Literal("success"),
  message: Type.String(),
});

// ============================================================================
// ID Parameter Schemas
// ============================================================================

export const IdParamSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
});

export type IdParam = Static<typeof IdParamSchema>;
