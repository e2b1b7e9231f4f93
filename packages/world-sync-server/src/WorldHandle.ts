import { Vector3Int } from "@interest-sync/protocol";

import { createOneShot, Sender } from "./channel";
import { PlayerHandshake, PlayerId, PlayerSnapshot, WorldCommand } from "./WorldCommand";

/**
 * Typed access to a world's command channel. Each handle owns one sender;
 * clone it per producer and close it when done, since the world only stops
 * once every handle is closed.
 *
 * Every method rejects with ChannelClosedError once the handle or the world's
 * channel is closed.
 */
export class WorldHandle {
  constructor(private sender: Sender<WorldCommand>) {}

  public get isClosed(): boolean {
    return this.sender.isClosed;
  }

  public clone(): WorldHandle {
    return new WorldHandle(this.sender.clone());
  }

  public close() {
    this.sender.close();
  }

  /**
   * Registers a new player and waits for its id and outbox.
   */
  public async connect(): Promise<PlayerHandshake> {
    const [reply, handshake] = createOneShot<PlayerHandshake>();
    await this.sender.send({ type: "connect", reply });
    return handshake;
  }

  public disconnect(id: PlayerId): Promise<void> {
    return this.sender.send({ type: "disconnect", id });
  }

  public setInterest(id: PlayerId, center: Vector3Int, radius: number): Promise<void> {
    return this.sender.send({ type: "setInterest", id, center, radius });
  }

  public setPosition(id: PlayerId, position: Vector3Int): Promise<void> {
    return this.sender.send({ type: "setPosition", id, position });
  }

  public setRotation(id: PlayerId, rotation: Vector3Int): Promise<void> {
    return this.sender.send({ type: "setRotation", id, rotation });
  }

  public async snapshot(): Promise<Array<PlayerSnapshot>> {
    const [reply, players] = createOneShot<Array<PlayerSnapshot>>();
    await this.sender.send({ type: "snapshot", reply });
    return players;
  }
}
