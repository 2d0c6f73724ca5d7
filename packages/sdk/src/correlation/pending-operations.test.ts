import { describe, expect, it, vi } from "vitest";
import { PendingOperationTable, type OutboundOperation } from "./pending-operations.js";

function outbound(id: number, timer: ReturnType<typeof setTimeout> | null = null): OutboundOperation {
  return {
    direction: "outbound",
    id,
    method: "ping",
    issuedAt: 0,
    timer,
    resolve: vi.fn(),
    reject: vi.fn(),
  };
}

describe("PendingOperationTable", () => {
  it("keeps outbound and inbound entries with the same id apart", () => {
    const table = new PendingOperationTable();
    table.addOutbound(outbound(7));
    expect(table.addInbound({ direction: "inbound", id: 7, method: "tool.call", receivedAt: 0 })).toBe(true);

    expect(table.size()).toBe(2);
    expect(table.takeInbound(7)?.method).toBe("tool.call");
    expect(table.takeOutbound(7)?.method).toBe("ping");
    expect(table.size()).toBe(0);
  });

  it("distinguishes numeric and string ids", () => {
    expect(PendingOperationTable.key("inbound", 1)).toBe("inbound:1");
    expect(PendingOperationTable.key("inbound", "1")).toBe('inbound:"1"');
  });

  it("returns an entry at most once", () => {
    const table = new PendingOperationTable();
    table.addOutbound(outbound(1));

    expect(table.takeOutbound(1)).toBeDefined();
    expect(table.takeOutbound(1)).toBeUndefined();
  });

  it("refuses a second outbound entry with a pending id", () => {
    const table = new PendingOperationTable();
    table.addOutbound(outbound(3));

    expect(() => table.addOutbound(outbound(3))).toThrow("Outbound request id 3 is already pending");
  });

  it("reports duplicate inbound ids instead of overwriting them", () => {
    const table = new PendingOperationTable();
    const entry = { direction: "inbound" as const, id: "srv-1", method: "tool.call", receivedAt: 0 };

    expect(table.addInbound(entry)).toBe(true);
    expect(table.addInbound({ ...entry, method: "permission.request" })).toBe(false);
    expect(table.takeInbound("srv-1")?.method).toBe("tool.call");
  });

  it("clears deadlines when draining outbound entries", () => {
    vi.useFakeTimers();
    try {
      const table = new PendingOperationTable();
      const fired = vi.fn();
      table.addOutbound(outbound(1, setTimeout(fired, 100)));
      table.addOutbound(outbound(2));
      table.addInbound({ direction: "inbound", id: "a", method: "tool.call", receivedAt: 0 });

      const drained = table.drainOutbound();
      vi.advanceTimersByTime(200);

      expect(drained.map((entry) => entry.id)).toEqual([1, 2]);
      expect(fired).not.toHaveBeenCalled();
      expect(table.size("outbound")).toBe(0);
      expect(table.size("inbound")).toBe(1);
      expect(table.clearInbound()).toBe(1);
    } finally {
      vi.useRealTimers();
    }
  });
});
