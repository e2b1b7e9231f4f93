import {
  AcknowledgementMessage,
  ClientCommand,
  decodeBinaryCommand,
  decodeTextCommand,
  encodeHandshake,
  formatAcknowledgement,
} from "@interest-sync/protocol";

import { ChannelClosedError, Receiver } from "./channel";
import { FrameTransport, InboundFrame } from "./FrameTransport";
import { PlayerId } from "./WorldCommand";
import { WorldHandle } from "./WorldHandle";
import { WorldSyncConsoleLogger, WorldSyncLogger } from "./WorldSyncLogger";

export type ConnectionSessionState = "connecting" | "connected" | "closed";

type SessionEvent =
  | { source: "transport"; frame: InboundFrame }
  | { source: "transportError"; error: unknown }
  | { source: "outbox"; payload: Uint8Array | null };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Bridges one client transport to the world. The session owns a handle to the
 * world (closed when the session ends) and, once connected, the player's
 * outbox receiver.
 */
export class ConnectionSession {
  private state: ConnectionSessionState = "connecting";
  private playerId: PlayerId | null = null;

  private events: Array<SessionEvent> = [];
  private eventWaiter: ((event: SessionEvent) => void) | null = null;

  constructor(
    private transport: FrameTransport,
    private world: WorldHandle,
    private logger: WorldSyncLogger = new WorldSyncConsoleLogger(),
  ) {}

  public getPlayerId(): PlayerId | null {
    return this.playerId;
  }

  public getState(): ConnectionSessionState {
    return this.state;
  }

  /**
   * Closes the transport. The session notices through its pending read and
   * ends as usual, disconnecting the player.
   */
  public close(code?: number, reason?: string) {
    this.transport.close(code, reason);
  }

  /**
   * Runs the session to completion. Never rejects; failures are logged and end
   * only this session.
   */
  public async run(): Promise<void> {
    let id: PlayerId;
    let outbox: Receiver<Uint8Array>;
    try {
      ({ id, outbox } = await this.world.connect());
    } catch (error) {
      if (error instanceof ChannelClosedError) {
        this.logger.info("World is closed, rejecting connection");
      } else {
        this.logger.error("Failed to connect to world", error);
      }
      this.state = "closed";
      this.world.close();
      this.transport.close(1001, "World is closed");
      return;
    }

    this.playerId = id;
    this.state = "connected";
    this.logger.info(`Player ${id} connected`);

    try {
      await this.transport.writeFrame({
        opcode: "binary",
        payload: encodeHandshake({ type: "handshake", id }).getBuffer(),
      });
      await this.serve(id, outbox);
    } catch (error) {
      this.logger.warn(`Player ${id} session ended by error: ${errorMessage(error)}`);
    } finally {
      await this.end(id, outbox);
    }
  }

  private deliver(event: SessionEvent) {
    const waiter = this.eventWaiter;
    if (waiter !== null) {
      this.eventWaiter = null;
      waiter(event);
    } else {
      this.events.push(event);
    }
  }

  private nextEvent(): Promise<SessionEvent> {
    const event = this.events.shift();
    if (event !== undefined) {
      return Promise.resolve(event);
    }
    return new Promise<SessionEvent>((resolve) => {
      this.eventWaiter = resolve;
    });
  }

  private readNextFrame() {
    void this.transport.readFrame().then(
      (frame) => this.deliver({ source: "transport", frame }),
      (error: unknown) => this.deliver({ source: "transportError", error }),
    );
  }

  private receiveNextBroadcast(outbox: Receiver<Uint8Array>) {
    void outbox.recv().then((payload) => this.deliver({ source: "outbox", payload }));
  }

  private async serve(id: PlayerId, outbox: Receiver<Uint8Array>): Promise<void> {
    // At most one read is outstanding per source; whichever completes first
    // is handled first and the other stays pending
    this.readNextFrame();
    this.receiveNextBroadcast(outbox);

    for (;;) {
      const event = await this.nextEvent();
      switch (event.source) {
        case "transportError":
          this.logger.warn(`Player ${id} transport failed: ${errorMessage(event.error)}`);
          return;
        case "transport": {
          const { frame } = event;
          if (frame.opcode === "close") {
            return;
          }
          await this.handleCommandFrame(id, frame);
          this.readNextFrame();
          break;
        }
        case "outbox":
          if (event.payload === null) {
            this.logger.info(`Player ${id} outbox closed by world`);
            return;
          }
          await this.transport.writeFrame({ opcode: "binary", payload: event.payload });
          this.receiveNextBroadcast(outbox);
          break;
      }
    }
  }

  private async handleCommandFrame(
    id: PlayerId,
    frame: Exclude<InboundFrame, { opcode: "close" }>,
  ): Promise<void> {
    const decoded =
      frame.opcode === "text"
        ? decodeTextCommand(frame.payload)
        : decodeBinaryCommand(frame.payload);

    let acknowledgement: AcknowledgementMessage;
    if (decoded.success) {
      await this.applyCommand(id, decoded.command);
      acknowledgement = {
        type: "acknowledgement",
        commandName: decoded.commandName,
        status: "Ok",
      };
    } else if (decoded.commandName === null) {
      acknowledgement = { type: "acknowledgement", commandName: null, status: decoded.error };
    } else {
      acknowledgement = {
        type: "acknowledgement",
        commandName: decoded.commandName,
        status: decoded.error,
      };
    }
    await this.transport.writeFrame({
      opcode: "text",
      payload: formatAcknowledgement(acknowledgement),
    });
  }

  private applyCommand(id: PlayerId, command: ClientCommand): Promise<void> {
    switch (command.type) {
      case "setInterest":
        return this.world.setInterest(id, command.center, command.radius);
      case "setPosition":
        return this.world.setPosition(id, command.position);
      case "setRotation":
        return this.world.setRotation(id, command.rotation);
    }
  }

  private async end(id: PlayerId, outbox: Receiver<Uint8Array>) {
    this.state = "closed";
    try {
      await this.world.disconnect(id);
    } catch (error) {
      if (!(error instanceof ChannelClosedError)) {
        this.logger.error(`Failed to disconnect player ${id}`, error);
      }
    }
    this.world.close();
    outbox.close();
    this.transport.close();
    this.logger.info(`Player ${id} disconnected`);
  }
}
