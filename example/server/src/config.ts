export type ServerConfig = {
  port: number;
  worldSocketPath: string;
  tickHz: number;
  commandChannelCapacity: number;
  outboxCapacity: number;
};

function readPositiveInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, received "${raw}"`);
  }
  return value;
}

export function readServerConfig(env: NodeJS.ProcessEnv): ServerConfig {
  const worldSocketPath = env.WORLD_SOCKET_PATH || "/world";
  if (!worldSocketPath.startsWith("/")) {
    throw new Error(`WORLD_SOCKET_PATH must start with "/", received "${worldSocketPath}"`);
  }
  return {
    port: readPositiveInteger(env, "PORT", 8080),
    worldSocketPath,
    tickHz: readPositiveInteger(env, "TICK_HZ", 60),
    commandChannelCapacity: readPositiveInteger(env, "COMMAND_CHANNEL_CAPACITY", 128),
    outboxCapacity: readPositiveInteger(env, "OUTBOX_CAPACITY", 128),
  };
}
