// config/database.ts
import mongoose from "mongoose";
import type { AppConfig } from "./appConfig";
import { AdminSessionModel } from "../models/adminSession";
import { CategoryModel } from "../models/category";
import { DeliveryChargeModel } from "../models/deliveryCharge";
import { ProductModel } from "../models/product";

export interface IndexedModel {
  modelName: string;
  createIndexes(): Promise<unknown>;
}

export class IndexBuildError extends Error {
  constructor(public readonly modelName: string, cause: unknown) {
    super(`Could not build indexes for ${modelName}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "IndexBuildError";
  }
}

const INDEXED_MODELS: IndexedModel[] = [CategoryModel, ProductModel, DeliveryChargeModel, AdminSessionModel];

/**
 * Builds every schema index and waits for it. The unique indexes on
 * category.slug and adminsession.token are what keep those fields unique,
 * so a failed build (e.g. duplicates already in the collection) rejects.
 */
export async function ensureIndexes(models: IndexedModel[] = INDEXED_MODELS): Promise<void> {
  for (const model of models) {
    try {
      await model.createIndexes();
    } catch (err) {
      throw new IndexBuildError(model.modelName, err);
    }
  }
}

/**
 * Connects the default mongoose connection. Resolves to false instead of
 * rejecting when the server is unreachable so the API can still start and
 * report the outage on /test. Rejects when indexes cannot be built.
 */
export async function connectDatabase(config: AppConfig): Promise<boolean> {
  if (!config.databaseUrl) {
    console.warn("⚠️ DATABASE_URL is not set, starting without a database");
    return false;
  }

  try {
    await mongoose.connect(config.databaseUrl, {
      dbName: config.databaseName,
      serverSelectionTimeoutMS: 5000,
      // indexes are built by ensureIndexes, which surfaces failures
      autoIndex: false,
    });
    console.log("✅ MongoDB Connected");
  } catch (err) {
    console.error("❌ MongoDB Connection Error:", err instanceof Error ? err.message : err);
    return false;
  }

  await ensureIndexes();
  console.log("✅ MongoDB indexes ready");
  return true;
}

export async function disconnectDatabase(): Promise<void> {
  await mongoose.connection.close(false);
}
