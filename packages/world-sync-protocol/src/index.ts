export * from "./BufferReader";
export * from "./BufferWriter";
export * from "./world-sync-v1/messageTypes";
export * from "./world-sync-v1/integers";
export * from "./world-sync-v1/messages";
export * from "./world-sync-v1/decodeClientCommand";
export * from "./world-sync-v1/encodeClientCommand";
