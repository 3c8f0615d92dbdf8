export { ledgerEntryRoutes } from "./routes/ledger-entries.routes.js";
