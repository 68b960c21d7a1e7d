import { Router } from "express";
import { createProductController } from "../controllers/productController";
import type { DocumentStore } from "../store/documentStore";

// Public - anyone can browse products
export const createProductRouter = (store: DocumentStore) => {
  const products = createProductController(store);
  const productRouter = Router();

  productRouter.get("/", products.listProducts);
  productRouter.get("/:id", products.getProduct);

  return productRouter;
};

// Admin only - mounted behind requireAdmin
export const createAdminProductRouter = (store: DocumentStore) => {
  const products = createProductController(store);
  const adminProductRouter = Router();

  adminProductRouter.post("/", products.createProduct);
  adminProductRouter.put("/:id", products.updateProduct);
  adminProductRouter.delete("/:id", products.deleteProduct);

  return adminProductRouter;
};
