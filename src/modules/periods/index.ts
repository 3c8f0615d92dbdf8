export { periodRoutes } from "./routes/periods.routes.js";
