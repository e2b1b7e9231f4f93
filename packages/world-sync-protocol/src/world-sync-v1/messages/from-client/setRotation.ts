import { BufferReader } from "../../../BufferReader";
import { BufferWriter } from "../../../BufferWriter";
import { SetRotationCommandName, SetRotationMessageType } from "../../messageTypes";
import { formatVector3Int, readVector3Int, Vector3Int } from "../vector";

import { CommandArgumentsResult } from "./commandArguments";
import {
  encodeVectorCommand,
  parseVectorArguments,
  VectorCommandBinaryByteLength,
} from "./vectorCommand";

export type SetRotationCommand = {
  type: "setRotation";
  rotation: Vector3Int;
};

export function encodeSetRotation(
  command: SetRotationCommand,
  writer: BufferWriter = new BufferWriter(VectorCommandBinaryByteLength),
): BufferWriter {
  return encodeVectorCommand(SetRotationMessageType, command.rotation, writer);
}

// Assumes that the first byte has already been read (the message type)
export function decodeSetRotation(buffer: BufferReader): SetRotationCommand {
  return {
    type: "setRotation",
    rotation: readVector3Int(buffer),
  };
}

export function formatSetRotation(command: SetRotationCommand): string {
  return `${SetRotationCommandName} ${formatVector3Int(command.rotation)}`;
}

export function parseSetRotationArguments(
  args: Array<string>,
): CommandArgumentsResult<SetRotationCommand> {
  const result = parseVectorArguments(args);
  if (!result.success) {
    return result;
  }
  return { success: true, command: { type: "setRotation", rotation: result.command } };
}
