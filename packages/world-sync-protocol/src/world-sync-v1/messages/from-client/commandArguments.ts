export type CommandArgumentsError = "Invalid" | "ParseError";

export type CommandArgumentsResult<T> =
  | { success: true; command: T }
  | { success: false; error: CommandArgumentsError };
