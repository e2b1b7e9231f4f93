import { BufferReader } from "../../../BufferReader";
import { BufferWriter } from "../../../BufferWriter";
import { BroadcastHeaderByteLength, BroadcastRecordByteLength } from "../../messageTypes";
import { readVector3Int, Vector3Int, writeVector3Int } from "../vector";

export type EntityRecord = {
  id: number;
  position: Vector3Int;
  rotation: Vector3Int;
};

export type BroadcastMessage = {
  type: "broadcast";
  entities: Array<EntityRecord>;
};

export function broadcastByteLength(entityCount: number): number {
  return BroadcastHeaderByteLength + entityCount * BroadcastRecordByteLength;
}

/*
 Layout (all big-endian):
   count: uint32
   count x { id: uint32, position: 3 x int32, rotation: 3 x int32 }
*/
export function encodeBroadcast(
  message: BroadcastMessage,
  writer: BufferWriter = new BufferWriter(broadcastByteLength(message.entities.length)),
): BufferWriter {
  writer.writeUint32(message.entities.length);
  for (const entity of message.entities) {
    writer.writeUint32(entity.id);
    writeVector3Int(entity.position, writer);
    writeVector3Int(entity.rotation, writer);
  }
  return writer;
}

export function decodeBroadcast(bytes: Uint8Array): BroadcastMessage {
  const reader = new BufferReader(bytes);
  const count = reader.readUInt32();
  if (bytes.length !== broadcastByteLength(count)) {
    throw new Error(
      `Broadcast declares ${count} entities (${broadcastByteLength(count)} bytes) but is ${bytes.length} bytes`,
    );
  }
  const entities: Array<EntityRecord> = [];
  for (let i = 0; i < count; i++) {
    const id = reader.readUInt32();
    const position = readVector3Int(reader);
    const rotation = readVector3Int(reader);
    entities.push({ id, position, rotation });
  }
  return {
    type: "broadcast",
    entities,
  };
}
