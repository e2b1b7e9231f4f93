// Client -> Server (binary command frames, first byte)
export const SetInterestMessageType = 1;
export const SetPositionMessageType = 2;
export const SetRotationMessageType = 3;

// Client -> Server (text command frames, first token)
export const SetInterestCommandName = "SetInterest";
export const SetPositionCommandName = "SetPosition";
export const SetRotationCommandName = "SetRotation";

export type CommandName =
  | typeof SetInterestCommandName
  | typeof SetPositionCommandName
  | typeof SetRotationCommandName;

// Server -> Client (binary frames, fixed widths in bytes)
export const HandshakeByteLength = 4;
export const BroadcastHeaderByteLength = 4;
export const BroadcastRecordByteLength = 28;
