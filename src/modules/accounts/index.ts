export { accountRoutes } from "./routes/accounts.routes.js";
