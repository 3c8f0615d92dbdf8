import type { Env } from "../config/env.js";
import { connectMongo } from "../db/mongo.js";
import type { LoggerLike } from "../types.js";
import { MemoryLedgerStore } from "./memory/memory-store.js";
import { MongoLedgerStore } from "./mongo/mongo-store.js";
import type { LedgerStore } from "./types.js";

export async function createStore(
  config: Pick<
    Env,
    "STORE_DRIVER" | "MONGODB_URI" | "MONGODB_DB_NAME" | "MONGO_ALLOW_NON_TRANSACTIONAL" | "LOCK_TIMEOUT_MS"
  >,
  log: LoggerLike,
): Promise<LedgerStore> {
  if (config.STORE_DRIVER === "memory") {
    log.warn("[store] using the in-memory driver; data is lost on restart");
    return new MemoryLedgerStore({ lockTimeoutMs: config.LOCK_TIMEOUT_MS, log });
  }

  if (!config.MONGODB_URI) throw new Error("MONGODB_URI is required when STORE_DRIVER=mongo");
  await connectMongo(config.MONGODB_URI, config.MONGODB_DB_NAME, log);
  return new MongoLedgerStore({ allowNonTransactional: config.MONGO_ALLOW_NON_TRANSACTIONAL, log });
}
