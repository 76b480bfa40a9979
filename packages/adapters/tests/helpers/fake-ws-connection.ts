/**
 * Scripted IWsConnection for adapter tests
 */

import type { IWsConnection, WsReceiveResult } from "../../src/polymarket/ws-connection";

export class FakeWsConnection implements IWsConnection {
  readonly sent: unknown[] = [];
  readonly frames: WsReceiveResult[] = [];
  readonly receiveTimeouts: number[] = [];
  connectError: Error | null = null;
  private open = false;

  async connect(): Promise<void> {
    if (this.connectError) throw this.connectError;
    this.open = true;
  }

  send(payload: unknown): boolean {
    if (!this.open) return false;
    this.sent.push(payload);
    return true;
  }

  async receive(timeoutMs: number): Promise<WsReceiveResult> {
    this.receiveTimeouts.push(timeoutMs);
    return this.frames.shift() ?? { kind: "timeout" };
  }

  async close(): Promise<void> {
    this.open = false;
  }

  isClosed(): boolean {
    return !this.open;
  }
}
