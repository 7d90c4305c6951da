import type WebSocket from 'ws';
import { DiscoveryError } from '../../domain/errors/DiscoveryError.js';

/**
 * The slice of a `ws` client socket that discovery relies on
 */
export interface DiscoverySocket {
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: WebSocket.RawData) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  send(data: string): void;
  close(): void;
}

interface Waiter {
  resolve: (message: string) => void;
  reject: (error: Error) => void;
}

export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf-8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  return Buffer.from(data).toString('utf-8');
}

/**
 * Turns the event-driven socket into sequential, timeout-bounded reads.
 * Messages that arrive before anyone reads are queued in order.
 */
export class SocketChannel {
  private readonly queue: string[] = [];
  private waiter: Waiter | null = null;
  private opened = false;
  private openWaiter: { resolve: () => void; reject: (error: Error) => void } | null = null;
  private failure: Error | null = null;
  private closed = false;

  constructor(
    private readonly socket: DiscoverySocket,
    private readonly url: string,
    private readonly signal?: AbortSignal
  ) {
    socket.on('open', () => {
      this.opened = true;
      this.openWaiter?.resolve();
      this.openWaiter = null;
    });
    socket.on('message', (data) => this.push(rawDataToString(data)));
    socket.on('error', (error) => this.fail(error));
    socket.on('close', (code, reason) => {
      const detail = reason.length > 0 ? `: ${reason.toString('utf-8')}` : '';
      this.fail(new Error(`WebSocket closed with code ${code}${detail}`));
    });
    signal?.addEventListener('abort', this.onAbort, { once: true });
  }

  /**
   * Resolves once the socket is open, bounded by `timeout` ms
   */
  async waitOpen(timeout: number): Promise<void> {
    if (this.failure) throw this.failure;
    if (this.opened) return;

    return this.withTimeout<void>(timeout, 'opening the websocket', (resolve, reject) => {
      this.openWaiter = { resolve: () => resolve(undefined), reject };
    });
  }

  /**
   * Next inbound message as text, bounded by `timeout` ms
   */
  async receive(timeout: number): Promise<string> {
    const next = this.queue.shift();
    if (next !== undefined) return next;
    if (this.failure) throw this.failure;

    return this.withTimeout<string>(timeout, 'waiting for a websocket message', (resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  send(data: unknown): void {
    if (this.failure) throw this.failure;
    this.socket.send(JSON.stringify(data));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.signal?.removeEventListener('abort', this.onAbort);
    this.fail(new Error('WebSocket closed'));
    this.socket.close();
  }

  private withTimeout<T>(
    timeout: number,
    activity: string,
    register: (resolve: (value: T) => void, reject: (error: Error) => void) => void
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        this.openWaiter = null;
        reject(new DiscoveryError(`Timed out after ${timeout}ms ${activity} on ${this.url}`, { url: this.url }));
      }, timeout);

      register(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  private push(message: string): void {
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve(message);
      return;
    }
    this.queue.push(message);
  }

  private fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;

    const waiters = [this.waiter, this.openWaiter];
    this.waiter = null;
    this.openWaiter = null;
    for (const waiter of waiters) {
      waiter?.reject(error);
    }
  }

  private readonly onAbort = (): void => {
    const reason: unknown = this.signal?.reason;
    this.fail(reason instanceof Error ? reason : new Error('Discovery aborted'));
  };
}
