import { BufferReader } from "../../../BufferReader";
import { BufferWriter } from "../../../BufferWriter";
import { SetPositionCommandName, SetPositionMessageType } from "../../messageTypes";
import { formatVector3Int, readVector3Int, Vector3Int } from "../vector";

import { CommandArgumentsResult } from "./commandArguments";
import {
  encodeVectorCommand,
  parseVectorArguments,
  VectorCommandBinaryByteLength,
} from "./vectorCommand";

export type SetPositionCommand = {
  type: "setPosition";
  position: Vector3Int;
};

export function encodeSetPosition(
  command: SetPositionCommand,
  writer: BufferWriter = new BufferWriter(VectorCommandBinaryByteLength),
): BufferWriter {
  return encodeVectorCommand(SetPositionMessageType, command.position, writer);
}

// Assumes that the first byte has already been read (the message type)
export function decodeSetPosition(buffer: BufferReader): SetPositionCommand {
  return {
    type: "setPosition",
    position: readVector3Int(buffer),
  };
}

export function formatSetPosition(command: SetPositionCommand): string {
  return `${SetPositionCommandName} ${formatVector3Int(command.position)}`;
}

export function parseSetPositionArguments(
  args: Array<string>,
): CommandArgumentsResult<SetPositionCommand> {
  const result = parseVectorArguments(args);
  if (!result.success) {
    return result;
  }
  return { success: true, command: { type: "setPosition", position: result.command } };
}
