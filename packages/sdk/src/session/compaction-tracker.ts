import type pino from "pino";
import { cancelledBy } from "../errors.js";
import { METHODS } from "../protocol/messages.js";
import {
  CompactionCompleteDataSchema,
  CompactionStartDataSchema,
  SESSION_EVENT_TYPES,
  UsageInfoDataSchema,
  type SessionEvent,
} from "../protocol/session-events.js";
import type { InfiniteSessionConfig } from "./session-config.js";

export type CompactionState = "normal" | "background-compacting" | "blocked-compacting";

type Waiter = {
  resolve: () => void;
  reject: (error: Error) => void;
};

/**
 * Follows the server's compaction events for one session. Utilization is
 * only ever taken from the server; nothing is counted locally. While the
 * session is blocked, `waitForAdmission` holds sends back until the server
 * reports that compaction completed.
 */
export class CompactionTracker {
  private current: CompactionState = "normal";
  private lastUtilization: number | null = null;
  private waiters: Waiter[] = [];
  private readonly listeners = new Set<(state: CompactionState) => void>();

  constructor(
    private readonly config: InfiniteSessionConfig,
    private readonly logger: pino.Logger
  ) {}

  get state(): CompactionState {
    return this.current;
  }

  get utilization(): number | null {
    return this.lastUtilization;
  }

  onStateChange(listener: (state: CompactionState) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  handleEvent(event: SessionEvent): void {
    if (!this.config.enabled) {
      return;
    }
    switch (event.type) {
      case SESSION_EVENT_TYPES.usageInfo: {
        const data = UsageInfoDataSchema.safeParse(event.data);
        if (data.success) {
          this.observeUtilization(data.data.utilization);
        }
        return;
      }
      case SESSION_EVENT_TYPES.compactionStart: {
        const data = CompactionStartDataSchema.safeParse(event.data);
        if (!data.success) {
          return;
        }
        if (data.data.utilization !== undefined) {
          this.lastUtilization = data.data.utilization;
        }
        if (data.data.blocking) {
          this.transition("blocked-compacting");
        } else if (this.current === "normal") {
          this.transition("background-compacting");
        }
        return;
      }
      case SESSION_EVENT_TYPES.compactionComplete: {
        const data = CompactionCompleteDataSchema.safeParse(event.data);
        if (data.success) {
          if (data.data.utilization !== undefined) {
            this.lastUtilization = data.data.utilization;
          }
          if (data.data.success === false) {
            this.logger.warn({ error: data.data.error }, "Server reported a failed compaction");
          }
        }
        this.transition("normal");
        return;
      }
      default:
        return;
    }
  }

  /**
   * Resolves at once unless the session is blocked on compaction. An abort
   * drops the held send from the queue.
   */
  waitForAdmission(signal?: AbortSignal): Promise<void> {
    if (this.current !== "blocked-compacting") {
      return Promise.resolve();
    }
    if (signal?.aborted) {
      return Promise.reject(cancelledBy(METHODS.sessionSend, signal.reason));
    }
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((waiter) => waiter !== held);
        reject(cancelledBy(METHODS.sessionSend, signal?.reason));
      };
      const held: Waiter = {
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
        reject: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        },
      };
      this.waiters.push(held);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  get waitingSends(): number {
    return this.waiters.length;
  }

  /**
   * Forgets everything learned from the previous server process. A compaction
   * it started will never complete, so held sends are released.
   */
  reset(): void {
    this.lastUtilization = null;
    this.transition("normal");
  }

  /** Rejects every held send, for a session that is going away. */
  failWaiters(error: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }

  private observeUtilization(utilization: number): void {
    this.lastUtilization = utilization;
    if (utilization >= this.config.bufferExhaustionThreshold) {
      this.transition("blocked-compacting");
    } else if (utilization >= this.config.backgroundCompactionThreshold && this.current === "normal") {
      this.transition("background-compacting");
    }
  }

  private transition(next: CompactionState): void {
    if (next === this.current) {
      return;
    }
    this.logger.debug(
      { from: this.current, to: next, utilization: this.lastUtilization },
      "Compaction state changed"
    );
    this.current = next;
    if (next !== "blocked-compacting") {
      const waiters = this.waiters;
      this.waiters = [];
      for (const waiter of waiters) {
        waiter.resolve();
      }
    }
    for (const listener of Array.from(this.listeners)) {
      listener(next);
    }
  }
}
