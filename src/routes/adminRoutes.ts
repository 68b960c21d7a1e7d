import { Router } from "express";
import { createAuthController } from "../controllers/authController";
import { requireAdmin } from "../middleware/auth";
import type { AdminSessionService } from "../services/AdminSessionService";
import type { DocumentStore } from "../store/documentStore";
import { createAdminCategoryRouter } from "./categoryRoutes";
import { createAdminDeliveryRouter } from "./deliveryRoutes";
import { createAdminProductRouter } from "./productRoutes";

export const createAdminRouter = (store: DocumentStore, sessions: AdminSessionService) => {
  const auth = createAuthController(sessions);
  const adminOnly = requireAdmin(sessions);
  const adminRouter = Router();

  // ============================================================================
  // PUBLIC ROUTES (No Authentication Required)
  // ============================================================================
  adminRouter.post("/login", auth.login);

  // ============================================================================
  // PROTECTED ADMIN ROUTES (X-Admin-Token Required)
  // ============================================================================
  adminRouter.use("/categories", adminOnly, createAdminCategoryRouter(store));
  adminRouter.use("/products", adminOnly, createAdminProductRouter(store));
  adminRouter.use("/delivery", adminOnly, createAdminDeliveryRouter(store));

  return adminRouter;
};
