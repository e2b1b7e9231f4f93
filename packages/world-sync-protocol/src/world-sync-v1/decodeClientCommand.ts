import { BufferReader } from "../BufferReader";

import {
  CommandName,
  SetInterestCommandName,
  SetInterestMessageType,
  SetPositionCommandName,
  SetPositionMessageType,
  SetRotationCommandName,
  SetRotationMessageType,
} from "./messageTypes";
import {
  ClientCommand,
  CommandArgumentsError,
  CommandArgumentsResult,
  decodeSetInterest,
  decodeSetPosition,
  decodeSetRotation,
  parseSetInterestArguments,
  parseSetPositionArguments,
  parseSetRotationArguments,
  SetInterestBinaryByteLength,
} from "./messages/from-client";
import { VectorCommandBinaryByteLength } from "./messages/from-client/vectorCommand";

export type ClientCommandDecodeResult =
  | { success: true; commandName: CommandName; command: ClientCommand }
  | { success: false; commandName: CommandName; error: CommandArgumentsError }
  | { success: false; commandName: null; error: "UnknownCommand" };

const textCommandParsers: Record<
  CommandName,
  (args: Array<string>) => CommandArgumentsResult<ClientCommand>
> = {
  [SetInterestCommandName]: parseSetInterestArguments,
  [SetPositionCommandName]: parseSetPositionArguments,
  [SetRotationCommandName]: parseSetRotationArguments,
};

function isCommandName(name: string): name is CommandName {
  return Object.prototype.hasOwnProperty.call(textCommandParsers, name);
}

/**
 * Decodes a text command frame: whitespace-separated tokens where the first
 * token names the command. Command names are case-sensitive.
 */
export function decodeTextCommand(text: string): ClientCommandDecodeResult {
  const [name, ...args] = text.trim().split(/\s+/);
  if (!isCommandName(name)) {
    return { success: false, commandName: null, error: "UnknownCommand" };
  }
  const result = textCommandParsers[name](args);
  if (!result.success) {
    return { success: false, commandName: name, error: result.error };
  }
  return { success: true, commandName: name, command: result.command };
}

type BinaryCommandDecoder = {
  commandName: CommandName;
  byteLength: number;
  decode: (buffer: BufferReader) => ClientCommand;
};

const binaryCommandDecoders = new Map<number, BinaryCommandDecoder>([
  [
    SetInterestMessageType,
    {
      commandName: SetInterestCommandName,
      byteLength: SetInterestBinaryByteLength,
      decode: decodeSetInterest,
    },
  ],
  [
    SetPositionMessageType,
    {
      commandName: SetPositionCommandName,
      byteLength: VectorCommandBinaryByteLength,
      decode: decodeSetPosition,
    },
  ],
  [
    SetRotationMessageType,
    {
      commandName: SetRotationCommandName,
      byteLength: VectorCommandBinaryByteLength,
      decode: decodeSetRotation,
    },
  ],
]);

/**
 * Decodes a binary command frame: one type byte followed by fixed-width
 * big-endian fields. A frame carries exactly one command.
 */
export function decodeBinaryCommand(bytes: Uint8Array): ClientCommandDecodeResult {
  if (bytes.length === 0) {
    return { success: false, commandName: null, error: "UnknownCommand" };
  }
  const decoder = binaryCommandDecoders.get(bytes[0]);
  if (decoder === undefined) {
    return { success: false, commandName: null, error: "UnknownCommand" };
  }
  if (bytes.length !== decoder.byteLength) {
    return { success: false, commandName: decoder.commandName, error: "Invalid" };
  }
  const reader = new BufferReader(bytes);
  reader.readUInt8();
  return { success: true, commandName: decoder.commandName, command: decoder.decode(reader) };
}
