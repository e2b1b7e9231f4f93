import { BufferWriter } from "../BufferWriter";

import {
  ClientCommand,
  encodeSetInterest,
  encodeSetPosition,
  encodeSetRotation,
  formatSetInterest,
  formatSetPosition,
  formatSetRotation,
} from "./messages/from-client";

export function encodeClientCommand(command: ClientCommand, writer?: BufferWriter): BufferWriter {
  switch (command.type) {
    case "setInterest":
      return encodeSetInterest(command, writer);
    case "setPosition":
      return encodeSetPosition(command, writer);
    case "setRotation":
      return encodeSetRotation(command, writer);
  }
}

export function formatClientCommand(command: ClientCommand): string {
  switch (command.type) {
    case "setInterest":
      return formatSetInterest(command);
    case "setPosition":
      return formatSetPosition(command);
    case "setRotation":
      return formatSetRotation(command);
  }
}
