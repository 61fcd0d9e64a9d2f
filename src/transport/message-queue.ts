import type { ClosedResult, ReceiveResult } from "./types.js";

const DEFAULT_HIGH_WATER_MARK = 1_000;

export interface MessageQueueOptions {
  readonly highWaterMark?: number;
  /** Called once the buffer reaches the high-water mark. */
  readonly onPause?: () => void;
  /** Called once a paused buffer drains to half the high-water mark. */
  readonly onResume?: () => void;
}

export interface MessageQueue {
  readonly push: (data: string) => void;
  readonly end: (abnormal: boolean, reason: string) => void;
  readonly next: (timeoutMs: number) => Promise<ReceiveResult>;
}

interface PendingReceive {
  readonly resolve: (result: ReceiveResult) => void;
  readonly timer: ReturnType<typeof setTimeout>;
}

/**
 * Single-consumer bridge from a transport's push events to the pull-style
 * receive a worker loops on. Buffered messages are always delivered before
 * the closure that followed them.
 */
export function createMessageQueue(
  options: MessageQueueOptions = {},
): MessageQueue {
  const highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
  const lowWaterMark = Math.floor(highWaterMark / 2);
  const buffer: string[] = [];
  let closed: ClosedResult | null = null;
  let pending: PendingReceive | null = null;
  let paused = false;

  function settle(result: ReceiveResult): boolean {
    if (pending === null) return false;
    const { resolve, timer } = pending;
    pending = null;
    clearTimeout(timer);
    resolve(result);
    return true;
  }

  return {
    push(data) {
      if (closed !== null) return;
      if (settle({ kind: "message", data })) return;

      buffer.push(data);
      if (!paused && buffer.length >= highWaterMark) {
        paused = true;
        options.onPause?.();
      }
    },

    end(abnormal, reason) {
      if (closed !== null) return;
      closed = { kind: "closed", abnormal, reason };
      if (buffer.length === 0) {
        settle(closed);
      }
    },

    next(timeoutMs) {
      if (pending !== null) {
        return Promise.reject(new Error("A receive is already pending on this connection"));
      }

      const data = buffer.shift();
      if (data !== undefined) {
        if (paused && buffer.length <= lowWaterMark) {
          paused = false;
          options.onResume?.();
        }
        return Promise.resolve({ kind: "message", data });
      }

      if (closed !== null) {
        return Promise.resolve(closed);
      }

      return new Promise<ReceiveResult>((resolve) => {
        const timer = setTimeout(() => {
          pending = null;
          resolve({ kind: "timeout" });
        }, timeoutMs);
        pending = { resolve, timer };
      });
    },
  };
}
