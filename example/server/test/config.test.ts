import { readServerConfig } from "../src/config";

describe("readServerConfig", () => {
  test("applies defaults", () => {
    expect(readServerConfig({})).toEqual({
      port: 8080,
      worldSocketPath: "/world",
      tickHz: 60,
      commandChannelCapacity: 128,
      outboxCapacity: 128,
    });
  });

  test("reads overrides", () => {
    expect(
      readServerConfig({
        PORT: "9000",
        WORLD_SOCKET_PATH: "/sync",
        TICK_HZ: "20",
        COMMAND_CHANNEL_CAPACITY: "64",
        OUTBOX_CAPACITY: "8",
      }),
    ).toEqual({
      port: 9000,
      worldSocketPath: "/sync",
      tickHz: 20,
      commandChannelCapacity: 64,
      outboxCapacity: 8,
    });
  });

  test.each([
    ["TICK_HZ", "0"],
    ["TICK_HZ", "fast"],
    ["OUTBOX_CAPACITY", "-1"],
    ["COMMAND_CHANNEL_CAPACITY", "1.5"],
  ])("rejects %s=%s", (name, value) => {
    expect(() => readServerConfig({ [name]: value })).toThrow(
      `${name} must be a positive integer, received "${value}"`,
    );
  });

  test("rejects a socket path without a leading slash", () => {
    expect(() => readServerConfig({ WORLD_SOCKET_PATH: "world" })).toThrow(
      'WORLD_SOCKET_PATH must start with "/", received "world"',
    );
  });
});
