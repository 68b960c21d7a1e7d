import { Router } from "express";
import { createCategoryController } from "../controllers/categoryController";
import type { DocumentStore } from "../store/documentStore";

// Public - anyone can browse categories
export const createCategoryRouter = (store: DocumentStore) => {
  const categories = createCategoryController(store);
  const categoryRouter = Router();

  categoryRouter.get("/", categories.listCategories);

  return categoryRouter;
};

// Admin only - mounted behind requireAdmin
export const createAdminCategoryRouter = (store: DocumentStore) => {
  const categories = createCategoryController(store);
  const adminCategoryRouter = Router();

  adminCategoryRouter.post("/", categories.createCategory);
  adminCategoryRouter.put("/:id", categories.updateCategory);
  adminCategoryRouter.delete("/:id", categories.deleteCategory);

  return adminCategoryRouter;
};
