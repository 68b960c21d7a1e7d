// controllers/categoryController.ts
import { Request, Response } from "express";
import asyncHandler from "../middleware/asyncHandler";
import { DocumentId, DuplicateKeyError, type DocumentStore } from "../store/documentStore";
import { ConflictError, NotFoundError } from "../util/errors";
import { serializeDocument } from "../util/serialize";
import { parsePayload, parseUpdate } from "../validation/parse";
import { createCategorySchema, updateCategorySchema } from "../validation/categoryValidation";

const slugConflict = () => new ConflictError("Slug already exists", "slug");

// The unique index on slug turns a concurrent duplicate into a single failed write.
const rethrowSlugConflict = (err: unknown): never => {
  if (err instanceof DuplicateKeyError) throw slugConflict();
  throw err;
};

export const createCategoryController = (store: DocumentStore) => {
  const categories = store.categories;

  // GET /api/categories
  const listCategories = asyncHandler(async (req: Request, res: Response) => {
    const items = await categories.find({}, { created_at: -1 });
    res.status(200).json(items.map(serializeDocument));
  });

  // POST /api/admin/categories
  const createCategory = asyncHandler(async (req: Request, res: Response) => {
    const payload = parsePayload(createCategorySchema, req.body);

    const id = await categories.insert(payload).catch(rethrowSlugConflict);
    const created = await categories.findOne({ id });
    if (!created) {
      throw new NotFoundError("Category not found");
    }

    res.status(201).json(serializeDocument(created));
  });

  // PUT /api/admin/categories/:id
  const updateCategory = asyncHandler(async (req: Request, res: Response) => {
    const changes = parseUpdate(updateCategorySchema, req.body);
    const id = DocumentId.parse(req.params.id);

    const matched = await categories.updateOne({ id }, changes).catch(rethrowSlugConflict);
    if (matched === 0) {
      throw new NotFoundError("Category not found");
    }

    const updated = await categories.findOne({ id });
    if (!updated) {
      throw new NotFoundError("Category not found");
    }
    res.status(200).json(serializeDocument(updated));
  });

  // DELETE /api/admin/categories/:id - products keep their category_slug
  const deleteCategory = asyncHandler(async (req: Request, res: Response) => {
    const id = DocumentId.parse(req.params.id);

    const removed = await categories.deleteOne({ id });
    if (!removed) {
      throw new NotFoundError("Category not found");
    }

    res.status(200).json({ success: true });
  });

  return { listCategories, createCategory, updateCategory, deleteCategory };
};
