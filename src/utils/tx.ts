import mongoose from "mongoose";
import type { LoggerLike } from "../types.js";

function isTransactionUnsupported(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  if (error instanceof mongoose.mongo.MongoServerError) {
    if (error.code === 20 || error.codeName === "IllegalOperation") return true;
  }

  return (
    error.message.includes("Transaction numbers are only allowed on a replica set member or mongos") ||
    error.message.includes("transactions are not supported")
  );
}

export interface TransactionOptions {
  /** Run without a session on standalone servers. Development only. */
  allowNonTransactional: boolean;
  log: LoggerLike;
}

/**
 * Run `fn` in a MongoDB multi-document transaction. Transient errors and
 * write conflicts are retried by the driver; `fn` must be safe to re-run.
 */
export async function runInTransaction<T>(
  fn: (session: mongoose.ClientSession | null) => Promise<T>,
  options: TransactionOptions,
): Promise<T> {
  const session = await mongoose.startSession();
  try {
    let outcome: { value: T } | undefined;
    try {
      await session.withTransaction(async () => {
        outcome = { value: await fn(session) };
      });
    } catch (error) {
      if (!isTransactionUnsupported(error) || !options.allowNonTransactional) throw error;
      options.log.warn(
        "[tx] MongoDB transactions are unavailable; executing operation without transaction session.",
      );
      return fn(null);
    }

    if (!outcome) throw new Error("Transaction committed without producing a result");
    return outcome.value;
  } finally {
    await session.endSession();
  }
}
