export class ChannelClosedError extends Error {
  constructor(message: string = "Channel is closed") {
    super(message);
    this.name = "ChannelClosedError";
  }
}
