import { encodeBroadcast, EntityRecord, Vector3Int } from "@interest-sync/protocol";

import { isWithinRadius } from "./AreaOfInterest";
import { createChannel, Receiver, Sender } from "./channel";
import { TickScheduler } from "./TickScheduler";
import { InterestRegion, PlayerId, PlayerSnapshot, WorldCommand } from "./WorldCommand";
import { WorldSyncConsoleLogger, WorldSyncLogger } from "./WorldSyncLogger";

export type WorldActorOptions = {
  // Broadcast passes per second (default: 60)
  tickHz?: number;
  // Broadcasts buffered per player before further ones are dropped (default: 128)
  outboxCapacity?: number;
};

// "idle" until run() is called
export type WorldActorState = "idle" | "running" | "stopped";

export type WorldActorStats = {
  state: WorldActorState;
  playerCount: number;
  tickCount: number;
  droppedBroadcasts: number;
};

type Player = {
  id: PlayerId;
  position: Vector3Int;
  rotation: Vector3Int;
  interest: InterestRegion | null;
  outbox: Sender<Uint8Array>;
  // Consecutive broadcasts dropped since the last one delivered
  droppedInRow: number;
};

/**
 * Sole owner of the player map. Everything reaches it as a WorldCommand on its
 * receiver; nothing else holds a reference to player state.
 */
export class WorldActor {
  private nextId: PlayerId = 1;
  private players = new Map<PlayerId, Player>();

  private scheduler: TickScheduler;
  private outboxCapacity: number;

  private state: WorldActorState = "idle";
  private tickCount = 0;
  private droppedBroadcasts = 0;

  private wake: (() => void) | null = null;
  private watchedSignals = new Set<Promise<void>>();

  constructor(
    private commands: Receiver<WorldCommand>,
    opts: WorldActorOptions = {},
    private logger: WorldSyncLogger = new WorldSyncConsoleLogger(),
  ) {
    this.scheduler = new TickScheduler(opts.tickHz ?? 60);
    this.outboxCapacity = opts.outboxCapacity ?? 128;
    if (!Number.isInteger(this.outboxCapacity) || this.outboxCapacity < 1) {
      throw new Error(
        `Outbox capacity must be a positive integer, received ${this.outboxCapacity}`,
      );
    }
  }

  public getStats(): WorldActorStats {
    return {
      state: this.state,
      playerCount: this.players.size,
      tickCount: this.tickCount,
      droppedBroadcasts: this.droppedBroadcasts,
    };
  }

  /**
   * Starts the tick loop. The returned promise resolves once the command
   * channel has closed and been drained; the actor cannot be restarted.
   */
  public run(): Promise<void> {
    if (this.state !== "idle") {
      throw new Error(`WorldActor cannot be run while ${this.state}`);
    }
    this.state = "running";
    this.scheduler.start();
    this.logger.info("World running", { tickPeriodMs: this.scheduler.periodMs });
    return this.loop();
  }

  private async loop(): Promise<void> {
    try {
      for (;;) {
        if (this.scheduler.hasPendingTick()) {
          this.tick();
          continue;
        }

        // A command that beats the tick is applied straight away
        const received = this.commands.tryRecv();
        if (received.status === "value") {
          this.applyCommand(received.value);
          continue;
        }
        if (received.status === "closed") {
          return;
        }

        await this.waitForWork();
      }
    } finally {
      this.stop();
    }
  }

  /**
   * Resolves once a command is readable or a tick fires. Each signal promise
   * gets a single reaction however many times the loop waits on it.
   */
  private waitForWork(): Promise<void> {
    this.watchSignal(this.commands.readable());
    this.watchSignal(this.scheduler.waitForTick());
    return new Promise<void>((resolve) => {
      this.wake = resolve;
    });
  }

  private watchSignal(signal: Promise<void>) {
    if (this.watchedSignals.has(signal)) {
      return;
    }
    this.watchedSignals.add(signal);
    void signal.then(() => {
      this.watchedSignals.delete(signal);
      const wake = this.wake;
      this.wake = null;
      if (wake !== null) {
        wake();
      }
    });
  }

  private tick() {
    const timerFires = this.scheduler.takePendingTicks();
    if (timerFires > 1) {
      this.logger.debug(`World fell behind, collapsing ${timerFires} ticks into one`);
    }

    for (;;) {
      const received = this.commands.tryRecv();
      if (received.status !== "value") {
        break;
      }
      this.applyCommand(received.value);
    }

    this.tickCount++;
    this.broadcast();
  }

  private broadcast() {
    for (const player of this.players.values()) {
      if (player.interest === null) {
        continue;
      }
      const { center, radius } = player.interest;

      const entities: Array<EntityRecord> = [];
      for (const other of this.players.values()) {
        // Players never receive their own record
        if (other.id === player.id) {
          continue;
        }
        if (isWithinRadius(center, radius, other.position)) {
          entities.push({ id: other.id, position: other.position, rotation: other.rotation });
        }
      }

      const payload = encodeBroadcast({ type: "broadcast", entities }).getBuffer();
      const result = player.outbox.trySend(payload);
      if (result === "sent") {
        if (player.droppedInRow > 0) {
          this.logger.debug(
            `Resumed broadcasts for player ${player.id} after ${player.droppedInRow} dropped`,
          );
          player.droppedInRow = 0;
        }
        continue;
      }
      this.droppedBroadcasts++;
      if (player.droppedInRow === 0) {
        this.logger.debug(`Dropping broadcasts for player ${player.id} (outbox ${result})`);
      }
      player.droppedInRow++;
    }
  }

  private applyCommand(command: WorldCommand) {
    switch (command.type) {
      case "connect": {
        const id = this.nextId++;
        const [outbox, outboxReceiver] = createChannel<Uint8Array>(this.outboxCapacity);
        this.players.set(id, {
          id,
          position: { x: 0, y: 0, z: 0 },
          rotation: { x: 0, y: 0, z: 0 },
          interest: null,
          outbox,
          droppedInRow: 0,
        });
        command.reply.send({ id, outbox: outboxReceiver });
        return;
      }
      case "disconnect":
        this.removePlayer(command.id);
        return;
      case "setInterest": {
        const player = this.players.get(command.id);
        if (player) {
          player.interest = { center: { ...command.center }, radius: command.radius };
        }
        return;
      }
      case "setPosition": {
        const player = this.players.get(command.id);
        if (player) {
          player.position = { ...command.position };
        }
        return;
      }
      case "setRotation": {
        const player = this.players.get(command.id);
        if (player) {
          player.rotation = { ...command.rotation };
        }
        return;
      }
      case "snapshot": {
        const snapshot: Array<PlayerSnapshot> = [];
        for (const player of this.players.values()) {
          snapshot.push({
            id: player.id,
            position: { ...player.position },
            rotation: { ...player.rotation },
            interest:
              player.interest === null
                ? null
                : { center: { ...player.interest.center }, radius: player.interest.radius },
          });
        }
        command.reply.send(snapshot);
        return;
      }
    }
  }

  private removePlayer(id: PlayerId) {
    const player = this.players.get(id);
    if (player === undefined) {
      return;
    }
    player.outbox.close();
    this.players.delete(id);
  }

  private stop() {
    this.state = "stopped";
    this.scheduler.stop();
    for (const player of this.players.values()) {
      player.outbox.close();
    }
    this.players.clear();
    this.logger.info("World stopped", { tickCount: this.tickCount });
  }
}
