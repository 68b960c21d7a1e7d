// models/deliveryCharge.ts
import mongoose, { Schema } from "mongoose";
import { z } from "zod";
import { DocumentId, type Stored } from "../store/documentStore";
import { objectIdField, optionalText } from "./decode";

export interface DeliveryRate {
  location: string; // zone name, e.g. "Inside City"
  charge: number;
}

/** Append-only: the newest table by `created_at` is the one in effect. */
export interface DeliveryCharge {
  name: string;
  notes?: string;
  rates: DeliveryRate[];
}

export interface DeliveryChargeDocument extends DeliveryCharge {
  created_at: Date;
}

const DeliveryRateSchema = new Schema<DeliveryRate>(
  {
    location: { type: String, required: true },
    charge: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

const DeliveryChargeSchema = new Schema<DeliveryChargeDocument>(
  {
    name: { type: String, default: "Standard Delivery" },
    notes: { type: String },
    rates: { type: [DeliveryRateSchema], default: [] },
    created_at: { type: Date, required: true, index: true },
  },
  { versionKey: false }
);

export const DeliveryChargeModel = mongoose.model<DeliveryChargeDocument>(
  "DeliveryCharge",
  DeliveryChargeSchema,
  "deliverycharge"
);

const StoredDeliveryCharge = z.object({
  _id: objectIdField,
  name: z.string(),
  notes: optionalText,
  rates: z.array(z.object({ location: z.string(), charge: z.number() })).default([]),
  created_at: z.date(),
  updated_at: z.date().optional(),
});

export const decodeDeliveryCharge = (raw: unknown): Stored<DeliveryCharge> => {
  const { _id, ...fields } = StoredDeliveryCharge.parse(raw);
  return { ...fields, id: DocumentId.parse(_id.toHexString()) };
};
