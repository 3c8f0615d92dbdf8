import mongoose from "mongoose";
import type { LoggerLike } from "../types.js";

let connected = false;

export async function connectMongo(uri: string, dbName: string, log: LoggerLike) {
  if (connected) return;
  await mongoose.connect(uri, { dbName });
  connected = true;
  log.info(`[mongo] connected to database "${dbName}"`);
}

export async function disconnectMongo() {
  if (!connected) return;
  await mongoose.disconnect();
  connected = false;
}
