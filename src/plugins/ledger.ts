import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import type { LedgerStore } from "../store/types.js";
import type { LedgerSettings, LoggerLike } from "../types.js";

export type StoreFactory = (log: LoggerLike) => Promise<LedgerStore>;

export interface LedgerPluginOptions {
  /** A ready store, or a factory called with the app logger. */
  store: LedgerStore | StoreFactory;
  settings: LedgerSettings;
}

async function ledgerPlugin(app: FastifyInstance, options: LedgerPluginOptions) {
  const store = typeof options.store === "function" ? await options.store(app.log) : options.store;

  app.decorate("ledger", { store, settings: options.settings, log: app.log });

  app.addHook("onClose", async () => {
    await store.close();
  });

  app.log.info(
    `[ledger] store=${store.driver} taxRate=${options.settings.taxRate} prefix=${options.settings.invoiceNumberPrefix}`,
  );
}

export default fp(ledgerPlugin, { name: "ledger" });
