export { invoiceRoutes } from "./routes/invoices.routes.js";
