import { z } from "zod";

export const ENVELOPE_KINDS = ["request", "response", "event", "error"] as const;
export type EnvelopeKind = (typeof ENVELOPE_KINDS)[number];

/**
 * Client-issued ids are positive integers from a per-client counter. Ids the
 * server issues for its own requests are treated as opaque.
 */
export const EnvelopeIdSchema = z.union([z.number().int().positive(), z.string().min(1)]);
export type EnvelopeId = z.infer<typeof EnvelopeIdSchema>;

export const RequestEnvelopeSchema = z.object({
  type: z.literal("request"),
  id: EnvelopeIdSchema,
  method: z.string().min(1),
  payload: z.unknown().optional(),
});

export const ResponseEnvelopeSchema = z.object({
  type: z.literal("response"),
  id: EnvelopeIdSchema,
  payload: z.unknown().optional(),
});

export const ErrorBodySchema = z.object({
  code: z.union([z.string(), z.number()]).optional(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const ErrorEnvelopeSchema = z.object({
  type: z.literal("error"),
  id: EnvelopeIdSchema.optional(),
  error: ErrorBodySchema,
});

export const EventEnvelopeSchema = z.object({
  type: z.literal("event"),
  event: z.string().min(1),
  sessionId: z.string().min(1).optional(),
  payload: z.unknown().optional(),
});

export const EnvelopeSchema = z.discriminatedUnion("type", [
  RequestEnvelopeSchema,
  ResponseEnvelopeSchema,
  ErrorEnvelopeSchema,
  EventEnvelopeSchema,
]);

export type RequestEnvelope = z.infer<typeof RequestEnvelopeSchema>;
export type ResponseEnvelope = z.infer<typeof ResponseEnvelopeSchema>;
export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;
export type EventEnvelope = z.infer<typeof EventEnvelopeSchema>;
export type ErrorBody = z.infer<typeof ErrorBodySchema>;
export type Envelope = z.infer<typeof EnvelopeSchema>;

export function isEnvelopeKind(value: unknown): value is EnvelopeKind {
  return ENVELOPE_KINDS.some((kind) => kind === value);
}
