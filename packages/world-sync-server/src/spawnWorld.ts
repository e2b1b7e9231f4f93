import { createChannel } from "./channel";
import { WorldActor, WorldActorOptions, WorldActorStats } from "./WorldActor";
import { WorldCommand } from "./WorldCommand";
import { WorldHandle } from "./WorldHandle";
import { WorldSyncConsoleLogger, WorldSyncLogger } from "./WorldSyncLogger";

export type SpawnWorldOptions = WorldActorOptions & {
  // Commands buffered before senders wait (default: 128)
  commandChannelCapacity?: number;
};

export type SpawnedWorld = {
  handle: WorldHandle;
  // Resolves when the world has stopped
  stopped: Promise<void>;
  getStats: () => WorldActorStats;
};

/**
 * Creates a command channel and a world actor reading from it, and starts the
 * actor's loop.
 */
export function spawnWorld(
  opts: SpawnWorldOptions = {},
  logger: WorldSyncLogger = new WorldSyncConsoleLogger(),
): SpawnedWorld {
  const [sender, receiver] = createChannel<WorldCommand>(opts.commandChannelCapacity ?? 128);
  const actor = new WorldActor(receiver, opts, logger);
  const stopped = actor.run();
  return {
    handle: new WorldHandle(sender),
    stopped,
    getStats: () => actor.getStats(),
  };
}
