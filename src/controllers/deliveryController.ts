// controllers/deliveryController.ts
import { Request, Response } from "express";
import asyncHandler from "../middleware/asyncHandler";
import type { DocumentStore } from "../store/documentStore";
import { NotFoundError } from "../util/errors";
import { serializeDocument } from "../util/serialize";
import { parsePayload } from "../validation/parse";
import { deliveryChargeSchema } from "../validation/deliveryValidation";

export const createDeliveryController = (store: DocumentStore) => {
  const charges = store.deliveryCharges;

  // GET /api/delivery - newest table wins, null before the first one is set
  const getDeliveryCharge = asyncHandler(async (req: Request, res: Response) => {
    const current = await charges.findOne({}, { created_at: -1 });
    res.status(200).json(current ? serializeDocument(current) : null);
  });

  // POST /api/admin/delivery - always inserts, never edits an older table
  const setDeliveryCharge = asyncHandler(async (req: Request, res: Response) => {
    const payload = parsePayload(deliveryChargeSchema, req.body);

    const id = await charges.insert(payload);
    const created = await charges.findOne({ id });
    if (!created) {
      throw new NotFoundError("Delivery charge not found");
    }

    res.status(201).json(serializeDocument(created));
  });

  return { getDeliveryCharge, setDeliveryCharge };
};
