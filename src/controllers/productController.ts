// controllers/productController.ts
import { Request, Response } from "express";
import asyncHandler from "../middleware/asyncHandler";
import type { Product } from "../models/product";
import { DocumentId, type DocumentStore, type Filter } from "../store/documentStore";
import { CategoryNotFoundError, NotFoundError } from "../util/errors";
import { serializeDocument } from "../util/serialize";
import { parsePayload, parseUpdate } from "../validation/parse";
import {
  createProductSchema,
  productListQuerySchema,
  updateProductSchema,
} from "../validation/productValidation";

export const createProductController = (store: DocumentStore) => {
  const products = store.products;

  const ensureCategoryExists = async (slug: string) => {
    const category = await store.categories.findOne({ slug });
    if (!category) {
      throw new CategoryNotFoundError();
    }
  };

  const findProductOrFail = async (id: DocumentId) => {
    const product = await products.findOne({ id });
    if (!product) {
      throw new NotFoundError("Product not found");
    }
    return product;
  };

  // GET /api/products?category_slug= - hides products explicitly out of stock
  const listProducts = asyncHandler(async (req: Request, res: Response) => {
    const { category_slug } = parsePayload(productListQuerySchema, req.query);

    const filter: Filter<Product> = { in_stock: { $ne: false } };
    if (category_slug) filter.category_slug = category_slug;

    const items = await products.find(filter, { created_at: -1 });
    res.status(200).json(items.map(serializeDocument));
  });

  // GET /api/products/:id
  const getProduct = asyncHandler(async (req: Request, res: Response) => {
    const product = await findProductOrFail(DocumentId.parse(req.params.id));
    res.status(200).json(serializeDocument(product));
  });

  // POST /api/admin/products
  const createProduct = asyncHandler(async (req: Request, res: Response) => {
    const payload = parsePayload(createProductSchema, req.body);
    await ensureCategoryExists(payload.category_slug);

    const id = await products.insert(payload);
    const created = await findProductOrFail(id);

    res.status(201).json(serializeDocument(created));
  });

  // PUT /api/admin/products/:id
  const updateProduct = asyncHandler(async (req: Request, res: Response) => {
    const changes = parseUpdate(updateProductSchema, req.body);
    const id = DocumentId.parse(req.params.id);

    if (changes.category_slug !== undefined) {
      await ensureCategoryExists(changes.category_slug);
    }

    const matched = await products.updateOne({ id }, changes);
    if (matched === 0) {
      throw new NotFoundError("Product not found");
    }

    res.status(200).json(serializeDocument(await findProductOrFail(id)));
  });

  // DELETE /api/admin/products/:id
  const deleteProduct = asyncHandler(async (req: Request, res: Response) => {
    const id = DocumentId.parse(req.params.id);

    const removed = await products.deleteOne({ id });
    if (!removed) {
      throw new NotFoundError("Product not found");
    }

    res.status(200).json({ success: true });
  });

  return { listProducts, getProduct, createProduct, updateProduct, deleteProduct };
};
