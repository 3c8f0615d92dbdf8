export { transactionRoutes } from "./routes/transactions.routes.js";
