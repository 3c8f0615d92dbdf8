export { productRoutes } from "./routes/products.routes.js";
