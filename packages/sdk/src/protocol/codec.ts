import { ProtocolError, describeError } from "../errors.js";
import { EnvelopeSchema, isEnvelopeKind, type Envelope } from "./envelope.js";

export const DEFAULT_DECODE_FAILURE_THRESHOLD = 5;

const MAX_FRAME_PREVIEW_LENGTH = 512;

export type DecodeResult =
  | { ok: true; envelope: Envelope }
  | { ok: false; error: ProtocolError };

export function encodeEnvelope(envelope: Envelope): string {
  return JSON.stringify(EnvelopeSchema.parse(envelope));
}

function previewFrame(frame: string): string {
  return frame.length > MAX_FRAME_PREVIEW_LENGTH
    ? `${frame.slice(0, MAX_FRAME_PREVIEW_LENGTH)}...`
    : frame;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(message: string, frame: string): DecodeResult {
  return { ok: false, error: new ProtocolError(message, previewFrame(frame)) };
}

/**
 * Never throws. Anything that is not a well-formed envelope comes back as a
 * ProtocolError value so the reader loop can log it and keep going.
 */
export function decodeEnvelope(frame: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(frame);
  } catch (error) {
    return fail(`Invalid JSON frame: ${describeError(error)}`, frame);
  }

  if (!isRecord(parsed) || !("type" in parsed)) {
    return fail("Envelope is missing its type discriminant", frame);
  }
  const kind = parsed.type;
  if (!isEnvelopeKind(kind)) {
    return fail(`Unknown envelope kind '${String(kind)}'`, frame);
  }
  if ((kind === "request" || kind === "response") && parsed.id === undefined) {
    return fail(`${kind} envelope is missing its id`, frame);
  }

  const result = EnvelopeSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
      .join("; ");
    return fail(`Malformed ${kind} envelope: ${details}`, frame);
  }
  return { ok: true, envelope: result.data };
}

/**
 * Counts consecutive decode failures. A successful decode resets the count.
 */
export class DecodeFailureTracker {
  private consecutive = 0;

  constructor(private readonly threshold = DEFAULT_DECODE_FAILURE_THRESHOLD) {}

  /** Returns true once the failure count reaches the threshold. */
  recordFailure(): boolean {
    this.consecutive += 1;
    return this.consecutive >= this.threshold;
  }

  recordSuccess(): void {
    this.consecutive = 0;
  }

  get consecutiveFailures(): number {
    return this.consecutive;
  }
}
