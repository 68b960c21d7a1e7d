import { Router } from "express";
import { createDeliveryController } from "../controllers/deliveryController";
import type { DocumentStore } from "../store/documentStore";

export const createDeliveryRouter = (store: DocumentStore) => {
  const delivery = createDeliveryController(store);
  const deliveryRouter = Router();

  deliveryRouter.get("/", delivery.getDeliveryCharge);

  return deliveryRouter;
};

export const createAdminDeliveryRouter = (store: DocumentStore) => {
  const delivery = createDeliveryController(store);
  const adminDeliveryRouter = Router();

  adminDeliveryRouter.post("/", delivery.setDeliveryCharge);

  return adminDeliveryRouter;
};
