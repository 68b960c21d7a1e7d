// validation/deliveryValidation.ts
import { z } from "zod";

export const deliveryRateSchema = z.object({
  location: z.string().trim().min(1, "Location is required"),
  charge: z.number().finite("Charge must be a finite number").min(0, "Charge cannot be negative"),
});

export const deliveryChargeSchema = z.object({
  name: z.string().default("Standard Delivery"),
  notes: z.string().optional(),
  rates: z.array(deliveryRateSchema).default([]),
});
