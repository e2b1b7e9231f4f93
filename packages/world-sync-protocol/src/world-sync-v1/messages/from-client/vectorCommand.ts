import { BufferWriter } from "../../../BufferWriter";
import { parseVector3IntTokens, Vector3Int, writeVector3Int } from "../vector";

import { CommandArgumentsResult } from "./commandArguments";

// Type byte + three int32
export const VectorCommandBinaryByteLength = 13;

export function encodeVectorCommand(
  messageType: number,
  vector: Vector3Int,
  writer: BufferWriter,
): BufferWriter {
  writer.writeUint8(messageType);
  writeVector3Int(vector, writer);
  return writer;
}

export function parseVectorArguments(args: Array<string>): CommandArgumentsResult<Vector3Int> {
  if (args.length !== 3) {
    return { success: false, error: "Invalid" };
  }
  const vector = parseVector3IntTokens(args);
  if (vector === null) {
    return { success: false, error: "ParseError" };
  }
  return { success: true, command: vector };
}
