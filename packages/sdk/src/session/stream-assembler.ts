import type pino from "pino";
import {
  MessageDataSchema,
  MessageDeltaDataSchema,
  ReasoningDataSchema,
  ReasoningDeltaDataSchema,
  SESSION_EVENT_TYPES,
  type SessionEvent,
} from "../protocol/session-events.js";

export type StreamKind = "message" | "reasoning";

export type CompletedBlock = {
  kind: StreamKind;
  blockId: string;
  content: string;
  /** What the deltas added up to, or null when no delta arrived. */
  assembled: string | null;
};

function bufferKey(kind: StreamKind, blockId: string): string {
  return `${kind}:${blockId}`;
}

/**
 * Buffers streamed deltas per (kind, block id) in arrival order until the
 * block's final event arrives.
 */
export class StreamAssembler {
  private readonly buffers = new Map<string, string[]>();

  constructor(
    private readonly logger: pino.Logger,
    private readonly streaming: boolean
  ) {}

  /** Feeds one session event; returns the finished block when the event closes one. */
  handleEvent(event: SessionEvent): CompletedBlock | null {
    switch (event.type) {
      case SESSION_EVENT_TYPES.messageDelta: {
        const data = MessageDeltaDataSchema.safeParse(event.data);
        if (!data.success) {
          this.logger.warn({ eventType: event.type }, "Malformed message delta");
          return null;
        }
        this.appendDelta("message", data.data.messageId, data.data.deltaContent);
        return null;
      }
      case SESSION_EVENT_TYPES.reasoningDelta: {
        const data = ReasoningDeltaDataSchema.safeParse(event.data);
        if (!data.success) {
          this.logger.warn({ eventType: event.type }, "Malformed reasoning delta");
          return null;
        }
        this.appendDelta("reasoning", data.data.reasoningId, data.data.deltaContent);
        return null;
      }
      case SESSION_EVENT_TYPES.message: {
        const data = MessageDataSchema.safeParse(event.data);
        return data.success ? this.complete("message", data.data.messageId, data.data.content) : null;
      }
      case SESSION_EVENT_TYPES.reasoning: {
        const data = ReasoningDataSchema.safeParse(event.data);
        return data.success
          ? this.complete("reasoning", data.data.reasoningId, data.data.content)
          : null;
      }
      default:
        return null;
    }
  }

  appendDelta(kind: StreamKind, blockId: string, delta: string): void {
    if (!this.streaming) {
      this.logger.warn(
        { kind, blockId },
        "Received a streaming delta for a session without streaming enabled"
      );
      return;
    }
    const key = bufferKey(kind, blockId);
    const buffer = this.buffers.get(key);
    if (buffer) {
      buffer.push(delta);
    } else {
      this.buffers.set(key, [delta]);
    }
  }

  complete(kind: StreamKind, blockId: string, content: string): CompletedBlock {
    const key = bufferKey(kind, blockId);
    const buffer = this.buffers.get(key);
    this.buffers.delete(key);
    const assembled = buffer ? buffer.join("") : null;
    if (assembled !== null && assembled !== content) {
      this.logger.warn(
        { kind, blockId, assembledLength: assembled.length, finalLength: content.length },
        "Streamed deltas do not match the final content"
      );
    }
    return { kind, blockId, content, assembled };
  }

  getPending(kind: StreamKind, blockId: string): string | undefined {
    return this.buffers.get(bufferKey(kind, blockId))?.join("");
  }

  get pendingBlocks(): number {
    return this.buffers.size;
  }

  clear(): void {
    this.buffers.clear();
  }
}
