import { BufferReader } from "../../../BufferReader";
import { BufferWriter } from "../../../BufferWriter";
import { parseIntegerToken, UINT16_MAX } from "../../integers";
import { SetInterestCommandName, SetInterestMessageType } from "../../messageTypes";
import { formatVector3Int, parseVector3IntTokens, readVector3Int, Vector3Int, writeVector3Int } from "../vector";

import { CommandArgumentsResult } from "./commandArguments";

export type SetInterestCommand = {
  type: "setInterest";
  center: Vector3Int;
  radius: number;
};

// Type byte + three int32 + uint16
export const SetInterestBinaryByteLength = 15;

export function encodeSetInterest(
  command: SetInterestCommand,
  writer: BufferWriter = new BufferWriter(SetInterestBinaryByteLength),
): BufferWriter {
  writer.writeUint8(SetInterestMessageType);
  writeVector3Int(command.center, writer);
  writer.writeUint16(command.radius);
  return writer;
}

// Assumes that the first byte has already been read (the message type)
export function decodeSetInterest(buffer: BufferReader): SetInterestCommand {
  const center = readVector3Int(buffer);
  const radius = buffer.readUInt16();
  return {
    type: "setInterest",
    center,
    radius,
  };
}

export function formatSetInterest(command: SetInterestCommand): string {
  return `${SetInterestCommandName} ${formatVector3Int(command.center)} ${command.radius}`;
}

// Tokens after the command name
export function parseSetInterestArguments(
  args: Array<string>,
): CommandArgumentsResult<SetInterestCommand> {
  if (args.length !== 4) {
    return { success: false, error: "Invalid" };
  }
  const center = parseVector3IntTokens(args.slice(0, 3));
  const radius = parseIntegerToken(args[3], 0, UINT16_MAX);
  if (center === null || radius === null) {
    return { success: false, error: "ParseError" };
  }
  return { success: true, command: { type: "setInterest", center, radius } };
}
