import type { ITcpSocket } from "../interfaces/socket.js";
import { concat } from "../utils/buffer.js";

export interface SocketReaderOptions {
  /**
   * Longest wait for any activity during one read. Unset means a read waits
   * for as long as the peer keeps the connection open.
   */
  timeoutMs?: number;
}

/**
 * Turns the callback-driven socket into blocking-style reads: each call
 * waits until bytes are available and hands back at most the requested
 * amount, keeping the rest for the next call.
 */
export class SocketReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private closed = false;
  private socketError: Error | null = null;
  private timedOut = false;
  private waiters: Array<() => void> = [];

  constructor(
    socket: ITcpSocket,
    private readonly options: SocketReaderOptions = {},
  ) {
    socket.onData((data) => {
      this.buffer = concat([this.buffer, data]);
      this.notifyWaiters();
    });

    socket.onEnd(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  /** The error the socket reported, if any. */
  get error(): Error | null {
    return this.socketError;
  }

  /** Whether the last failed read ended on the deadline. */
  get didTimeOut(): boolean {
    return this.timedOut;
  }

  /**
   * Read into `target`, returning the number of bytes written. Zero means
   * the connection is finished: closed, failed, or idle past the deadline.
   */
  async readInto(target: Uint8Array): Promise<number> {
    const chunk = await this.read(target.length);
    if (chunk === null) {
      return 0;
    }
    target.set(chunk);
    return chunk.length;
  }

  /** Read up to `maxBytes` into a fresh array, or `null` when finished. */
  async read(maxBytes: number): Promise<Uint8Array | null> {
    while (this.buffer.length === 0) {
      if (this.closed) {
        return null;
      }

      const hadActivity = await this.waitForActivity(this.options.timeoutMs);
      if (!hadActivity) {
        this.timedOut = true;
        return null;
      }
    }

    const take = Math.min(maxBytes, this.buffer.length);
    const chunk = this.buffer.slice(0, take);
    this.buffer = this.buffer.subarray(take);
    return chunk;
  }

  private waitForActivity(timeoutMs: number | undefined): Promise<boolean> {
    if (timeoutMs === undefined) {
      return new Promise((resolve) => {
        this.waiters.push(() => resolve(true));
      });
    }

    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
