import { BufferReader } from "../../../BufferReader";
import { BufferWriter } from "../../../BufferWriter";
import { HandshakeByteLength } from "../../messageTypes";

export type HandshakeMessage = {
  type: "handshake";
  id: number;
};

/**
 * The handshake is the first frame a client receives: its player id as a
 * bare uint32, with no type byte.
 */
export function encodeHandshake(
  message: HandshakeMessage,
  writer: BufferWriter = new BufferWriter(HandshakeByteLength),
): BufferWriter {
  writer.writeUint32(message.id);
  return writer;
}

export function decodeHandshake(bytes: Uint8Array): HandshakeMessage {
  if (bytes.length !== HandshakeByteLength) {
    throw new Error(
      `Handshake must be ${HandshakeByteLength} bytes, received ${bytes.length} bytes`,
    );
  }
  const id = new BufferReader(bytes).readUInt32();
  return {
    type: "handshake",
    id,
  };
}
