// models/product.ts
import mongoose, { Schema } from "mongoose";
import { z } from "zod";
import { DocumentId, type Stored } from "../store/documentStore";
import { objectIdField, optionalText } from "./decode";

export interface Product {
  title: string;
  description?: string;
  price: number;
  category_slug: string; // references Category.slug, checked by the controller
  image_url?: string;
  in_stock: boolean;
}

export interface ProductDocument extends Product {
  created_at: Date;
  updated_at?: Date;
}

const ProductSchema = new Schema<ProductDocument>(
  {
    title: { type: String, required: true, trim: true },
    description: { type: String },
    price: { type: Number, required: true, min: 0 },
    category_slug: { type: String, required: true, index: true },
    image_url: { type: String },
    in_stock: { type: Boolean, default: true },
    created_at: { type: Date, required: true },
    updated_at: { type: Date },
  },
  { versionKey: false }
);

ProductSchema.index({ in_stock: 1, created_at: -1 });

export const ProductModel = mongoose.model<ProductDocument>("Product", ProductSchema, "product");

const StoredProduct = z.object({
  _id: objectIdField,
  title: z.string(),
  description: optionalText,
  price: z.number(),
  category_slug: z.string(),
  image_url: optionalText,
  in_stock: z.boolean().default(true),
  created_at: z.date(),
  updated_at: z.date().optional(),
});

export const decodeProduct = (raw: unknown): Stored<Product> => {
  const { _id, ...fields } = StoredProduct.parse(raw);
  return { ...fields, id: DocumentId.parse(_id.toHexString()) };
};
