/**
 * WsConnection tests against an in-process WebSocket server on loopback
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { WebSocketServer, type WebSocket } from "ws";

import { WsConnection } from "../src/polymarket/ws-connection";

function listen(server: WebSocketServer): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("listening", () => {
      const address = server.address();
      if (typeof address === "string") {
        reject(new Error(`Unexpected address ${address}`));
        return;
      }
      resolve(address.port);
    });
  });
}

function closeServer(server: WebSocketServer): Promise<void> {
  for (const client of server.clients) client.terminate();
  return new Promise(resolve => {
    server.close(() => resolve());
  });
}

describe("WsConnection", () => {
  let server: WebSocketServer;
  let port: number;
  let onConnection: (socket: WebSocket) => void;
  const connections: WsConnection[] = [];

  beforeEach(async () => {
    onConnection = () => {};
    server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
    server.on("connection", socket => onConnection(socket));
    port = await listen(server);
  });

  afterEach(async () => {
    for (const conn of connections.splice(0)) await conn.close();
    await closeServer(server);
  });

  function connection(): WsConnection {
    const conn = new WsConnection({ url: `ws://127.0.0.1:${port}`, label: "test" });
    connections.push(conn);
    return conn;
  }

  test("should send JSON and receive decoded frames", async () => {
    const received: unknown[] = [];
    onConnection = socket => {
      socket.on("message", raw => {
        received.push(JSON.parse(String(raw)));
        socket.send(JSON.stringify([{ asset_id: "tok-up", bids: [] }]));
      });
    };
    const conn = connection();

    await conn.connect();
    expect(conn.send({ type: "subscribe" })).toBe(true);
    const result = await conn.receive(2000);

    expect(result).toEqual({ kind: "message", data: [{ asset_id: "tok-up", bids: [] }] });
    expect(received).toEqual([{ type: "subscribe" }]);
  });

  test("should deliver non-JSON frames as text", async () => {
    onConnection = socket => socket.send("PONG");
    const conn = connection();

    await conn.connect();

    expect(await conn.receive(2000)).toEqual({ kind: "message", data: "PONG" });
  });

  test("should time out when nothing arrives", async () => {
    const conn = connection();

    await conn.connect();

    expect(await conn.receive(20)).toEqual({ kind: "timeout" });
    expect(conn.isClosed()).toBe(false);
  });

  test("should report the close reason when the server closes", async () => {
    onConnection = socket => socket.close(1000, "bye");
    const conn = connection();

    await conn.connect();

    expect(await conn.receive(2000)).toEqual({ kind: "closed", reason: "bye" });
    expect(conn.isClosed()).toBe(true);
  });

  test("should refuse to send before connect", () => {
    expect(connection().send({ type: "subscribe" })).toBe(false);
  });

  test("should reject connect when nothing listens", async () => {
    const closedPort = port;
    await closeServer(server);
    server = new WebSocketServer({ noServer: true });
    const conn = new WsConnection({ url: `ws://127.0.0.1:${closedPort}` });
    connections.push(conn);

    await expect(conn.connect()).rejects.toThrow();
    expect(conn.isClosed()).toBe(true);
  });
});
