import { BufferReader } from "../../BufferReader";
import { BufferWriter } from "../../BufferWriter";
import { INT32_MAX, INT32_MIN, parseIntegerToken } from "../integers";

/**
 * A quantized world-space triple. Each axis is a signed 32-bit integer.
 */
export type Vector3Int = {
  x: number;
  y: number;
  z: number;
};

export function writeVector3Int(vector: Vector3Int, writer: BufferWriter) {
  writer.writeInt32(vector.x);
  writer.writeInt32(vector.y);
  writer.writeInt32(vector.z);
}

export function readVector3Int(buffer: BufferReader): Vector3Int {
  const x = buffer.readInt32();
  const y = buffer.readInt32();
  const z = buffer.readInt32();
  return { x, y, z };
}

// Expects exactly three tokens
export function parseVector3IntTokens(tokens: Array<string>): Vector3Int | null {
  const [x, y, z] = tokens.map((token) => parseIntegerToken(token, INT32_MIN, INT32_MAX));
  if (x === null || y === null || z === null) {
    return null;
  }
  return { x, y, z };
}

export function formatVector3Int(vector: Vector3Int): string {
  return `${vector.x} ${vector.y} ${vector.z}`;
}
