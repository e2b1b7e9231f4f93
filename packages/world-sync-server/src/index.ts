export * from "./channel";
export * from "./AreaOfInterest";
export * from "./ConnectionSession";
export * from "./createFrameTransportForWebsocket";
export * from "./FrameTransport";
export * from "./spawnWorld";
export * from "./TickScheduler";
export * from "./WorldActor";
export * from "./WorldCommand";
export * from "./WorldHandle";
export * from "./WorldSyncLogger";
export * from "./WorldSyncServer";
