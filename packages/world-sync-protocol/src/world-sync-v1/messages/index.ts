export * from "./from-client";
export * from "./from-server";
export * from "./vector";
