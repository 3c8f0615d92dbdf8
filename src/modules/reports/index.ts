export { reportRoutes } from "./routes/reports.routes.js";
