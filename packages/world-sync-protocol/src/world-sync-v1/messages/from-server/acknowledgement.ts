import {
  CommandName,
  SetInterestCommandName,
  SetPositionCommandName,
  SetRotationCommandName,
} from "../../messageTypes";

export type AcknowledgementStatus = "Ok" | "Invalid" | "ParseError";

export type AcknowledgementMessage =
  | { type: "acknowledgement"; commandName: CommandName; status: AcknowledgementStatus }
  | { type: "acknowledgement"; commandName: null; status: "UnknownCommand" };

// Prefix used in place of a command name when the command could not be identified
export const UnknownCommandSubject = "Error";

/**
 * Acknowledgements are text frames of the form `<CommandName> <Status>`, or
 * `Error UnknownCommand` when the command name was not recognised.
 */
export function formatAcknowledgement(message: AcknowledgementMessage): string {
  if (message.commandName === null) {
    return `${UnknownCommandSubject} ${message.status}`;
  }
  return `${message.commandName} ${message.status}`;
}

export function parseAcknowledgement(text: string): AcknowledgementMessage {
  const parts = text.split(" ");
  if (parts.length !== 2) {
    throw new Error(`Malformed acknowledgement: ${text}`);
  }
  const [subject, status] = parts;
  if (subject === UnknownCommandSubject && status === "UnknownCommand") {
    return { type: "acknowledgement", commandName: null, status };
  }
  if (
    (subject === SetInterestCommandName ||
      subject === SetPositionCommandName ||
      subject === SetRotationCommandName) &&
    (status === "Ok" || status === "Invalid" || status === "ParseError")
  ) {
    return { type: "acknowledgement", commandName: subject, status };
  }
  throw new Error(`Malformed acknowledgement: ${text}`);
}
