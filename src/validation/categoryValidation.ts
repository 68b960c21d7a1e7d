// validation/categoryValidation.ts
import slugify from "slugify";
import { z } from "zod";

const isUrlSafeSlug = (slug: string) => slugify(slug, { lower: true, strict: true }) === slug;

const slugField = z
  .string()
  .min(1, "Slug is required")
  .refine(isUrlSafeSlug, "Slug may only contain lowercase letters, digits and hyphens");

export const createCategorySchema = z.object({
  name: z.string().trim().min(1, "Name is required"),
  slug: slugField,
  description: z.string().optional(),
  is_active: z.boolean().default(true),
});

export const updateCategorySchema = z.object({
  name: z.string().trim().min(1, "Name is required").optional(),
  slug: slugField.optional(),
  description: z.string().optional(),
  is_active: z.boolean().optional(),
});

export type CategoryUpdate = z.output<typeof updateCategorySchema>;
