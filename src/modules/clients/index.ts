export { clientRoutes } from "./routes/clients.routes.js";
