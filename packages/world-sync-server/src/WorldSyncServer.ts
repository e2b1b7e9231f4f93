import WebSocket from "ws";

import { ConnectionSession } from "./ConnectionSession";
import { createFrameTransportForWebsocket } from "./createFrameTransportForWebsocket";
import { spawnWorld } from "./spawnWorld";
import { WorldActorStats } from "./WorldActor";
import { WorldHandle } from "./WorldHandle";
import { WorldSyncConsoleLogger, WorldSyncLogger } from "./WorldSyncLogger";

export type WorldSyncServerOptions = {
  // Broadcast passes per second (default: 60)
  tickHz?: number;
  // Commands buffered before sessions wait (default: 128)
  commandChannelCapacity?: number;
  // Broadcasts buffered per player before further ones are dropped (default: 128)
  outboxCapacity?: number;
  // Largest inbound message accepted, in bytes (default: 1024)
  maxMessageSize?: number;
  // Unread inbound frames allowed before a socket is closed (default: 256)
  maxPendingInboundFrames?: number;
};

const GOING_AWAY_CLOSE_CODE = 1001;

/**
 * Runs one world and a ConnectionSession per accepted WebSocket.
 */
export class WorldSyncServer {
  private world: WorldHandle;
  private worldStopped: Promise<void>;
  private worldStats: () => WorldActorStats;

  private sessions = new Map<ConnectionSession, Promise<void>>();
  private disposed = false;
  private disposing: Promise<void> | null = null;

  constructor(
    private options: WorldSyncServerOptions = {},
    private logger: WorldSyncLogger = new WorldSyncConsoleLogger(),
  ) {
    const spawned = spawnWorld(
      {
        tickHz: options.tickHz,
        commandChannelCapacity: options.commandChannelCapacity,
        outboxCapacity: options.outboxCapacity,
      },
      logger,
    );
    this.world = spawned.handle;
    this.worldStopped = spawned.stopped;
    this.worldStats = spawned.getStats;
  }

  public connectClient(webSocket: WebSocket): ConnectionSession {
    if (this.disposed) {
      throw new Error("This WorldSyncServer has been disposed");
    }
    const transport = createFrameTransportForWebsocket(webSocket, {
      maxMessageSize: this.options.maxMessageSize,
      maxPendingInboundFrames: this.options.maxPendingInboundFrames,
    });
    const session = new ConnectionSession(transport, this.world.clone(), this.logger);
    const running = session.run().finally(() => {
      this.sessions.delete(session);
    });
    this.sessions.set(session, running);
    return session;
  }

  public getConnectedClientCount(): number {
    return this.sessions.size;
  }

  public getWorldStats(): WorldActorStats {
    return this.worldStats();
  }

  /**
   * Stops accepting clients, closes every session's socket and resolves once
   * the world and all sessions have ended. Idempotent.
   */
  public dispose(): Promise<void> {
    if (this.disposing !== null) {
      return this.disposing;
    }
    this.disposed = true;
    this.logger.info("Disposing WorldSyncServer", { sessions: this.sessions.size });

    this.world.close();
    const sessionsEnded = Array.from(this.sessions.values());
    for (const session of this.sessions.keys()) {
      session.close(GOING_AWAY_CLOSE_CODE, "Server shutting down");
    }
    this.disposing = Promise.all([this.worldStopped, ...sessionsEnded]).then(() => {
      this.logger.info("WorldSyncServer disposed");
    });
    return this.disposing;
  }
}
