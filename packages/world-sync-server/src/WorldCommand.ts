import { Vector3Int } from "@interest-sync/protocol";

import { OneShotSender, Receiver } from "./channel";

export type PlayerId = number;

export type InterestRegion = {
  center: Vector3Int;
  radius: number;
};

export type PlayerHandshake = {
  id: PlayerId;
  outbox: Receiver<Uint8Array>;
};

export type PlayerSnapshot = {
  id: PlayerId;
  position: Vector3Int;
  rotation: Vector3Int;
  interest: InterestRegion | null;
};

export type ConnectCommand = {
  type: "connect";
  reply: OneShotSender<PlayerHandshake>;
};

export type DisconnectCommand = {
  type: "disconnect";
  id: PlayerId;
};

export type SetInterestWorldCommand = {
  type: "setInterest";
  id: PlayerId;
  center: Vector3Int;
  radius: number;
};

export type SetPositionWorldCommand = {
  type: "setPosition";
  id: PlayerId;
  position: Vector3Int;
};

export type SetRotationWorldCommand = {
  type: "setRotation";
  id: PlayerId;
  rotation: Vector3Int;
};

export type SnapshotCommand = {
  type: "snapshot";
  reply: OneShotSender<Array<PlayerSnapshot>>;
};

export type WorldCommand =
  | ConnectCommand
  | DisconnectCommand
  | SetInterestWorldCommand
  | SetPositionWorldCommand
  | SetRotationWorldCommand
  | SnapshotCommand;
