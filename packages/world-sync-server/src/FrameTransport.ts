export type InboundFrame =
  | { opcode: "text"; payload: string }
  | { opcode: "binary"; payload: Uint8Array }
  | { opcode: "close" };

export type OutboundFrame =
  | { opcode: "text"; payload: string }
  | { opcode: "binary"; payload: Uint8Array };

/**
 * A message-framed duplex connection as seen by a ConnectionSession.
 *
 * `readFrame` resolves with the next inbound frame (a close frame once the
 * peer has gone) and rejects on a transport error. It is called by a single
 * reader, one call at a time. `writeFrame` rejects if the frame could not be
 * written.
 */
export interface FrameTransport {
  readFrame(): Promise<InboundFrame>;
  writeFrame(frame: OutboundFrame): Promise<void>;
  close(code?: number, reason?: string): void;
}
