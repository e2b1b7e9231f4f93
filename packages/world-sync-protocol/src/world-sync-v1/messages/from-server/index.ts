import { AcknowledgementMessage } from "./acknowledgement";
import { BroadcastMessage } from "./broadcast";
import { HandshakeMessage } from "./handshake";

export * from "./acknowledgement";
export * from "./broadcast";
export * from "./handshake";

export type ServerMessage = HandshakeMessage | BroadcastMessage | AcknowledgementMessage;
