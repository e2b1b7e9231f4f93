import { WorldSyncServer } from "@interest-sync/server";
import dotenv from "dotenv";
import express from "express";
import enableWs from "express-ws";
import WebSocket from "ws";

import { readServerConfig } from "./config";

dotenv.config();
const config = readServerConfig(process.env);

const { app } = enableWs(express());
app.enable("trust proxy");

const worldSyncServer = new WorldSyncServer({
  tickHz: config.tickHz,
  commandChannelCapacity: config.commandChannelCapacity,
  outboxCapacity: config.outboxCapacity,
});

app.ws(config.worldSocketPath, (ws: WebSocket) => {
  worldSyncServer.connectClient(ws);
});

app.get("/stats", (req, res) => {
  res.json({
    connectedClients: worldSyncServer.getConnectedClientCount(),
    world: worldSyncServer.getWorldStats(),
  });
});

// Start listening
console.log("Listening on port", config.port);
const httpServer = app.listen(config.port);

function shutdown(signal: string) {
  console.log(`Received ${signal}, shutting down`);
  httpServer.close();
  worldSyncServer
    .dispose()
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      console.error("Error during shutdown", error);
      process.exit(1);
    });
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
