// models/category.ts
import mongoose, { Schema } from "mongoose";
import { z } from "zod";
import { DocumentId, type Stored } from "../store/documentStore";
import { objectIdField, optionalText } from "./decode";

export interface Category {
  name: string;
  slug: string; // unique, URL-safe public key
  description?: string;
  is_active: boolean;
}

export interface CategoryDocument extends Category {
  created_at: Date;
  updated_at?: Date;
}

const CategorySchema = new Schema<CategoryDocument>(
  {
    name: { type: String, required: true, trim: true },
    slug: { type: String, required: true, unique: true },
    description: { type: String },
    is_active: { type: Boolean, default: true },
    created_at: { type: Date, required: true, index: true },
    updated_at: { type: Date },
  },
  { versionKey: false }
);

export const CategoryModel = mongoose.model<CategoryDocument>("Category", CategorySchema, "category");

const StoredCategory = z.object({
  _id: objectIdField,
  name: z.string(),
  slug: z.string(),
  description: optionalText,
  is_active: z.boolean().default(true),
  created_at: z.date(),
  updated_at: z.date().optional(),
});

export const decodeCategory = (raw: unknown): Stored<Category> => {
  const { _id, ...fields } = StoredCategory.parse(raw);
  return { ...fields, id: DocumentId.parse(_id.toHexString()) };
};
