import type { LoggerLike } from "../../types.js";
import { disconnectMongo } from "../../db/mongo.js";
import { runInTransaction } from "../../utils/tx.js";
import type { LedgerStore, Readers, UnitOfWork } from "../types.js";
import { createMongoRepositories } from "./repositories.js";

export interface MongoStoreOptions {
  allowNonTransactional: boolean;
  log: LoggerLike;
}

/**
 * LedgerStore over MongoDB. Each `write` is one multi-document
 * transaction; `lockForUpdate` bumps the document revision inside it, so two
 * units touching the same parent conflict and the driver retries the loser.
 */
export class MongoLedgerStore implements LedgerStore {
  readonly driver = "mongo" as const;

  constructor(private readonly options: MongoStoreOptions) {}

  async read<T>(fn: (readers: Readers) => Promise<T>): Promise<T> {
    return fn(createMongoRepositories(null));
  }

  async write<T>(fn: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    return runInTransaction((session) => fn(createMongoRepositories(session)), this.options);
  }

  async close(): Promise<void> {
    await disconnectMongo();
  }
}
