import type { EnvelopeId } from "../protocol/envelope.js";

export type OperationDirection = "outbound" | "inbound";

/** A request we sent and still await an answer for. */
export type OutboundOperation = {
  direction: "outbound";
  id: EnvelopeId;
  method: string;
  issuedAt: number;
  timer: ReturnType<typeof setTimeout> | null;
  resolve: (payload: unknown) => void;
  reject: (error: Error) => void;
};

/** A server request we owe exactly one answer to. */
export type InboundOperation = {
  direction: "inbound";
  id: EnvelopeId;
  method: string;
  receivedAt: number;
};

export type PendingOperation = OutboundOperation | InboundOperation;

/**
 * One id table for both directions. Entries are keyed by direction plus id, so
 * a server-issued id can never collide with one of ours.
 */
export class PendingOperationTable {
  private readonly entries = new Map<string, PendingOperation>();

  static key(direction: OperationDirection, id: EnvelopeId): string {
    return `${direction}:${JSON.stringify(id)}`;
  }

  addOutbound(operation: OutboundOperation): void {
    const key = PendingOperationTable.key("outbound", operation.id);
    if (this.entries.has(key)) {
      throw new Error(`Outbound request id ${String(operation.id)} is already pending`);
    }
    this.entries.set(key, operation);
  }

  /** Returns false when an inbound request with the same id is still unanswered. */
  addInbound(operation: InboundOperation): boolean {
    const key = PendingOperationTable.key("inbound", operation.id);
    if (this.entries.has(key)) {
      return false;
    }
    this.entries.set(key, operation);
    return true;
  }

  /** Removes and returns the outbound entry, clearing its deadline. */
  takeOutbound(id: EnvelopeId): OutboundOperation | undefined {
    const key = PendingOperationTable.key("outbound", id);
    const entry = this.entries.get(key);
    if (!entry || entry.direction !== "outbound") {
      return undefined;
    }
    this.entries.delete(key);
    if (entry.timer) {
      clearTimeout(entry.timer);
    }
    return entry;
  }

  takeInbound(id: EnvelopeId): InboundOperation | undefined {
    const key = PendingOperationTable.key("inbound", id);
    const entry = this.entries.get(key);
    if (!entry || entry.direction !== "inbound") {
      return undefined;
    }
    this.entries.delete(key);
    return entry;
  }

  has(direction: OperationDirection, id: EnvelopeId): boolean {
    return this.entries.has(PendingOperationTable.key(direction, id));
  }

  size(direction?: OperationDirection): number {
    if (!direction) {
      return this.entries.size;
    }
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.direction === direction) {
        count += 1;
      }
    }
    return count;
  }

  /** Removes every outbound entry, clearing deadlines, and returns them. */
  drainOutbound(): OutboundOperation[] {
    const drained: OutboundOperation[] = [];
    for (const [key, entry] of this.entries) {
      if (entry.direction !== "outbound") {
        continue;
      }
      this.entries.delete(key);
      if (entry.timer) {
        clearTimeout(entry.timer);
      }
      drained.push(entry);
    }
    return drained;
  }

  clearInbound(): number {
    let cleared = 0;
    for (const [key, entry] of this.entries) {
      if (entry.direction === "inbound") {
        this.entries.delete(key);
        cleared += 1;
      }
    }
    return cleared;
  }
}
