// validation/productValidation.ts
import { z } from "zod";

const isHttpUrl = (value: string): boolean => {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
};

// JSON numbers past the double range parse to Infinity.
const priceField = z.number().finite("Price must be a finite number").min(0, "Price cannot be negative");

const imageUrlField = z.string().refine(isHttpUrl, "Image URL must be a valid http(s) URL");

export const createProductSchema = z.object({
  title: z.string().trim().min(1, "Title is required"),
  description: z.string().optional(),
  price: priceField,
  category_slug: z.string().min(1, "Category is required"),
  image_url: imageUrlField.optional(),
  in_stock: z.boolean().default(true),
});

export const updateProductSchema = z.object({
  title: z.string().trim().min(1, "Title is required").optional(),
  description: z.string().optional(),
  price: priceField.optional(),
  category_slug: z.string().min(1, "Category is required").optional(),
  image_url: imageUrlField.optional(),
  in_stock: z.boolean().optional(),
});

export type ProductUpdate = z.output<typeof updateProductSchema>;

// A repeated ?category_slug= arrives as an array and is rejected.
export const productListQuerySchema = z.object({
  category_slug: z.string().optional(),
});
