/**
 * WsConnection - WebSocket connection wrapper with bounded receive
 *
 * Direct implementation on the `ws` package.
 *
 * Features:
 * - receive(timeoutMs) for loops that must re-check state between frames
 * - Protocol-level keep-alive ping
 * - Reconnection-friendly: connect()/close()/isClosed(), one instance per connection
 */

import WebSocket from "ws";
import { logger } from "@updown-recorder/utils";

const log = logger.child("ws");

/**
 * Options for creating a WebSocket connection
 */
export interface WsConnectionOptions {
  /**
   * Full WebSocket URL (e.g., wss://ws-subscriptions-clob.polymarket.com/ws/market)
   */
  url: string;

  /**
   * Optional headers to send during handshake (e.g., User-Agent)
   */
  headers?: Record<string, string>;

  /**
   * Label for logging (e.g., "market")
   */
  label?: string;

  /**
   * Keep-alive ping interval. 0 disables pings.
   */
  pingIntervalMs?: number;
}

/**
 * Frames are JSON-decoded when possible, otherwise delivered as text.
 */
export type WsReceiveResult =
  | { kind: "message"; data: unknown }
  | { kind: "timeout" }
  | { kind: "closed"; reason: string };

/**
 * Interface for WebSocket connections used by adapters.
 * Both WsConnection and test fakes implement this interface.
 */
export interface IWsConnection {
  connect: () => Promise<void>;
  /**
   * Serialize and send. `false` when the socket is not open.
   */
  send: (payload: unknown) => boolean;
  receive: (timeoutMs: number) => Promise<WsReceiveResult>;
  close: () => Promise<void>;
  isClosed: () => boolean;
}

/**
 * Connection factory type for dependency injection in tests
 */
export type WsConnectionFactory = (options: WsConnectionOptions) => IWsConnection;

interface QueuedFrame {
  data: unknown;
}

function frameToText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

function decodeFrame(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class WsConnection implements IWsConnection {
  private ws: WebSocket | null = null;
  private closed = true;
  private closeReason: string | null = null;
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly label: string;
  private readonly pingIntervalMs: number;
  private pingTimer: ReturnType<typeof setInterval> | null = null;

  // Buffered frames and the single pending receive()
  private queue: QueuedFrame[] = [];
  private pendingResolve: ((result: WsReceiveResult) => void) | null = null;

  constructor(options: WsConnectionOptions) {
    this.url = options.url;
    this.headers = options.headers ?? {};
    this.label = options.label ?? options.url;
    this.pingIntervalMs = options.pingIntervalMs ?? 0;
  }

  /**
   * Connect to the WebSocket server. Rejects when the handshake fails.
   */
  async connect(): Promise<void> {
    if (this.ws && !this.closed) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      let opened = false;
      this.closed = false;
      this.closeReason = null;
      this.queue = [];

      const ws = new WebSocket(this.url, { headers: this.headers });
      this.ws = ws;

      ws.on("open", () => {
        opened = true;
        log.debug(`WsConnection opened: ${this.label}`);
        this.startPing();
        resolve();
      });

      ws.on("message", (data: WebSocket.RawData) => {
        this.enqueue({ data: decodeFrame(frameToText(data)) });
      });

      ws.on("close", (code: number, reason: Buffer) => {
        const text = reason.toString("utf8");
        log.debug(`WsConnection closed: ${this.label}`, { code, reason: text });
        this.handleClose(text === "" ? `closed with code ${code}` : text);
        if (!opened) reject(new Error(`Connection closed before open (code ${code})`));
      });

      ws.on("error", (error: Error) => {
        log.warn(`WsConnection error: ${this.label}`, { error });
        this.handleClose(error.message);
        if (!opened) reject(error);
      });
    });
  }

  send(payload: unknown): boolean {
    if (this.ws === null || this.ws.readyState !== WebSocket.OPEN) {
      return false;
    }
    this.ws.send(JSON.stringify(payload));
    return true;
  }

  /**
   * Wait up to `timeoutMs` for the next frame. Single consumer.
   */
  receive(timeoutMs: number): Promise<WsReceiveResult> {
    const next = this.queue.shift();
    if (next !== undefined) {
      return Promise.resolve({ kind: "message", data: next.data });
    }

    if (this.closed) {
      return Promise.resolve({ kind: "closed", reason: this.closeReason ?? "not connected" });
    }

    // A previous waiter, if any, gives up.
    this.pendingResolve?.({ kind: "timeout" });

    return new Promise<WsReceiveResult>(resolve => {
      const timer = setTimeout(() => {
        if (this.pendingResolve === settle) this.pendingResolve = null;
        resolve({ kind: "timeout" });
      }, timeoutMs);

      const settle = (result: WsReceiveResult): void => {
        clearTimeout(timer);
        if (this.pendingResolve === settle) this.pendingResolve = null;
        resolve(result);
      };
      this.pendingResolve = settle;
    });
  }

  /**
   * Close the WebSocket connection
   */
  async close(): Promise<void> {
    const ws = this.ws;
    this.ws = null;
    this.handleClose("closed by client");
    ws?.close();
  }

  /**
   * Check if the connection is closed
   */
  isClosed(): boolean {
    return this.closed;
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private startPing(): void {
    if (this.pingIntervalMs <= 0) return;
    this.pingTimer = setInterval(() => {
      if (this.ws?.readyState === WebSocket.OPEN) {
        this.ws.ping();
      }
    }, this.pingIntervalMs);
  }

  private stopPing(): void {
    if (this.pingTimer !== null) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  private enqueue(frame: QueuedFrame): void {
    const resolve = this.pendingResolve;
    if (resolve) {
      resolve({ kind: "message", data: frame.data });
    } else {
      this.queue.push(frame);
    }
  }

  private handleClose(reason: string): void {
    this.stopPing();
    if (!this.closed) {
      this.closed = true;
      this.closeReason = reason;
    }

    const resolve = this.pendingResolve;
    if (resolve) {
      resolve({ kind: "closed", reason: this.closeReason ?? reason });
    }
  }
}

/**
 * Default connection factory using WsConnection
 */
export const defaultConnectionFactory: WsConnectionFactory = options => new WsConnection(options);
