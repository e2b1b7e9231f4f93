import { decodeBroadcast, decodeHandshake, encodeClientCommand } from "@interest-sync/protocol";
import { jest } from "@jest/globals";
import WebSocket from "ws";

import { WorldSyncServer, WorldSyncServerOptions } from "../src";

import { MockWebsocket, ReceivedFrame } from "./mock.websocket";
import { createMockLogger, MockLogger } from "./test-utils";

let currentServer: WorldSyncServer | null = null;
let currentLogger: MockLogger | null = null;

function createServer(opts: WorldSyncServerOptions = {}): WorldSyncServer {
  currentLogger = createMockLogger();
  currentServer = new WorldSyncServer({ tickHz: 10, ...opts }, currentLogger);
  return currentServer;
}

async function connect(server: WorldSyncServer) {
  const ws = new MockWebsocket();
  const session = server.connectClient(ws as unknown as WebSocket);
  const [handshake] = await ws.waitForTotalFrameCount(1);
  if (handshake.type !== "binary") {
    throw new Error("Expected a binary handshake");
  }
  return { ws, session, id: decodeHandshake(handshake.bytes).id };
}

function textOf(frames: Array<ReceivedFrame>): Array<string> {
  return frames.map((frame) => (frame.type === "text" ? frame.text : "<binary>"));
}

function broadcastOf(frame: ReceivedFrame) {
  if (frame.type !== "binary") {
    throw new Error(`Expected a broadcast, received text "${frame.text}"`);
  }
  return decodeBroadcast(frame.bytes).entities;
}

beforeEach(() => {
  jest.useFakeTimers();
});

afterEach(async () => {
  if (currentServer) {
    await currentServer.dispose();
    currentServer = null;
  }
  currentLogger = null;
  jest.useRealTimers();
});

describe("WorldSyncServer", () => {
  test("sends each client its id as a four byte handshake", async () => {
    const server = createServer();
    const first = new MockWebsocket();
    const second = new MockWebsocket();
    server.connectClient(first as unknown as WebSocket);
    server.connectClient(second as unknown as WebSocket);

    expect(await first.waitForTotalFrameCount(1)).toEqual([
      { type: "binary", bytes: new Uint8Array([0, 0, 0, 1]) },
    ]);
    expect(await second.waitForTotalFrameCount(1)).toEqual([
      { type: "binary", bytes: new Uint8Array([0, 0, 0, 2]) },
    ]);
    expect(server.getConnectedClientCount()).toBe(2);
  });

  test("acknowledges text commands in order", async () => {
    const server = createServer();
    const { ws } = await connect(server);

    ws.sendTextFromClient("SetPosition 1 2 3");
    ws.sendTextFromClient("SetPosition 1 2");
    ws.sendTextFromClient("SetInterest 0 0 0 70000");
    ws.sendTextFromClient("Jump 1 2 3");
    ws.sendTextFromClient("  SetRotation   1  2   3 ");
    ws.sendTextFromClient("SetInterest 0 0 0 abc");

    expect(textOf(await ws.waitForTotalFrameCount(7, 1))).toEqual([
      "SetPosition Ok",
      "SetPosition Invalid",
      "SetInterest ParseError",
      "Error UnknownCommand",
      "SetRotation Ok",
      "SetInterest ParseError",
    ]);
  });

  test("acknowledges a burst larger than the unread frame limit", async () => {
    const server = createServer({ maxPendingInboundFrames: 256 });
    const { ws, session } = await connect(server);

    for (let i = 0; i < 300; i++) {
      ws.sendTextFromClient(`SetPosition ${i} 0 0`);
    }

    const acks = textOf(await ws.waitForTotalFrameCount(301, 1));
    expect(acks).toHaveLength(300);
    expect(new Set(acks)).toEqual(new Set(["SetPosition Ok"]));
    expect(ws.closeCode).toBeNull();
    expect(session.getState()).toBe("connected");
  });

  test("acknowledges binary commands", async () => {
    const server = createServer();
    const { ws } = await connect(server);

    ws.sendBinaryFromClient(
      encodeClientCommand({ type: "setPosition", position: { x: -4, y: 0, z: 9 } }).getBuffer(),
    );
    ws.sendBinaryFromClient(new Uint8Array([2, 0, 0]));
    ws.sendBinaryFromClient(new Uint8Array([9]));

    expect(textOf(await ws.waitForTotalFrameCount(4, 1))).toEqual([
      "SetPosition Ok",
      "SetPosition Invalid",
      "Error UnknownCommand",
    ]);
  });

  test("broadcasts players inside a client's interest region", async () => {
    const server = createServer();
    const watcher = await connect(server);
    const mover = await connect(server);

    watcher.ws.sendTextFromClient("SetInterest 0 0 0 10");
    mover.ws.sendTextFromClient("SetPosition 3 4 0");
    mover.ws.sendTextFromClient("SetRotation 0 90 0");
    await watcher.ws.waitForTotalFrameCount(2);
    await mover.ws.waitForTotalFrameCount(3);

    await jest.advanceTimersByTimeAsync(100);

    const [, , broadcast] = await watcher.ws.waitForTotalFrameCount(3);
    expect(broadcastOf(broadcast)).toEqual([
      { id: mover.id, position: { x: 3, y: 4, z: 0 }, rotation: { x: 0, y: 90, z: 0 } },
    ]);
    // No interest region, no broadcast
    expect(mover.ws.frames).toHaveLength(3);
  });

  test("a rejected command leaves the world unchanged", async () => {
    const server = createServer();
    const watcher = await connect(server);
    const mover = await connect(server);

    watcher.ws.sendTextFromClient("SetInterest 0 0 0 10");
    mover.ws.sendTextFromClient("SetPosition 5 x 0");
    await watcher.ws.waitForTotalFrameCount(2);
    expect(textOf(await mover.ws.waitForTotalFrameCount(2, 1))).toEqual([
      "SetPosition ParseError",
    ]);

    await jest.advanceTimersByTimeAsync(100);

    const [, , broadcast] = await watcher.ws.waitForTotalFrameCount(3);
    expect(broadcastOf(broadcast)).toEqual([
      { id: mover.id, position: { x: 0, y: 0, z: 0 }, rotation: { x: 0, y: 0, z: 0 } },
    ]);
  });

  test("removes a player when its client closes", async () => {
    const server = createServer();
    const watcher = await connect(server);
    const leaver = await connect(server);
    watcher.ws.sendTextFromClient("SetInterest 0 0 0 10");
    await watcher.ws.waitForTotalFrameCount(2);

    leaver.ws.closeFromClient();
    await jest.advanceTimersByTimeAsync(100);

    expect(leaver.session.getState()).toBe("closed");
    expect(server.getConnectedClientCount()).toBe(1);
    const [, , broadcast] = await watcher.ws.waitForTotalFrameCount(3);
    expect(broadcastOf(broadcast)).toEqual([]);
    expect(server.getWorldStats().playerCount).toBe(1);
    expect(currentLogger?.info).toHaveBeenCalledWith(`Player ${leaver.id} disconnected`);
  });

  test("ends only the failing session on a transport error", async () => {
    const server = createServer();
    const healthy = await connect(server);
    const failing = await connect(server);

    failing.ws.failFromClient(new Error("connection reset"));
    await jest.advanceTimersByTimeAsync(100);

    expect(currentLogger?.warn).toHaveBeenCalledWith(
      `Player ${failing.id} transport failed: connection reset`,
    );
    expect(server.getConnectedClientCount()).toBe(1);
    expect(healthy.session.getState()).toBe("connected");
    healthy.ws.sendTextFromClient("SetPosition 1 1 1");
    expect(textOf(await healthy.ws.waitForTotalFrameCount(2, 1))).toEqual(["SetPosition Ok"]);
  });

  test("ends the session when a write fails", async () => {
    const server = createServer();
    const { ws, session, id } = await connect(server);

    ws.failNextSend = true;
    ws.sendTextFromClient("SetPosition 1 1 1");
    await jest.advanceTimersByTimeAsync(100);

    expect(session.getState()).toBe("closed");
    expect(ws.readyState).toBe(WebSocket.CLOSED);
    expect(currentLogger?.warn).toHaveBeenCalledWith(
      `Player ${id} session ended by error: Send failed`,
    );
    expect(server.getWorldStats().playerCount).toBe(0);
  });

  test("closes sockets that send oversized messages", async () => {
    const server = createServer({ maxMessageSize: 16 });
    const { ws } = await connect(server);

    ws.sendTextFromClient("SetPosition 100000 100000 100000");
    await jest.advanceTimersByTimeAsync(100);

    expect(ws.closeCode).toBe(1008);
    expect(server.getConnectedClientCount()).toBe(0);
  });

  test("dispose closes every session and stops the world", async () => {
    const server = createServer();
    const first = await connect(server);
    const second = await connect(server);

    await server.dispose();
    currentServer = null;

    expect(first.ws.closeCode).toBe(1001);
    expect(first.ws.closeReason).toBe("Server shutting down");
    expect(second.ws.closeCode).toBe(1001);
    expect(server.getConnectedClientCount()).toBe(0);
    expect(server.getWorldStats().state).toBe("stopped");
    expect(() => server.connectClient(new MockWebsocket() as unknown as WebSocket)).toThrow(
      "This WorldSyncServer has been disposed",
    );
  });
});
