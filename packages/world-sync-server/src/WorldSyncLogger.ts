export type WorldSyncLogFunction = (...args: Array<unknown>) => void;

export type WorldSyncLogger = {
  trace: WorldSyncLogFunction;
  debug: WorldSyncLogFunction;
  info: WorldSyncLogFunction;
  warn: WorldSyncLogFunction;
  error: WorldSyncLogFunction;
};

export class WorldSyncConsoleLogger implements WorldSyncLogger {
  trace(...args: Array<unknown>) {
    console.trace(...args);
  }

  debug(...args: Array<unknown>) {
    console.debug(...args);
  }

  info(...args: Array<unknown>) {
    console.info(...args);
  }

  warn(...args: Array<unknown>) {
    console.warn(...args);
  }

  error(...args: Array<unknown>) {
    console.error(...args);
  }
}
