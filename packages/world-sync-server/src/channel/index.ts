export * from "./Channel";
export * from "./ChannelClosedError";
export * from "./OneShot";
