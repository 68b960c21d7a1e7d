// store/mongoStore.ts
import mongoose, { Model, Types } from "mongoose";
import {
  DocumentId,
  DuplicateKeyError,
  isNotEqualCondition,
  type Collection,
  type DocumentStore,
  type Filter,
  type InsertOptions,
  type SortSpec,
  type StoreStatus,
  type Stored,
} from "./documentStore";
import { StoreUnavailableError } from "../util/errors";
import { duplicateKeyFields, isDuplicateKeyError } from "../util/isDuplicateKeyError";
import {
  CategoryModel,
  decodeCategory,
  type Category,
  type CategoryDocument,
} from "../models/category";
import { ProductModel, decodeProduct, type Product, type ProductDocument } from "../models/product";
import {
  DeliveryChargeModel,
  decodeDeliveryCharge,
  type DeliveryCharge,
  type DeliveryChargeDocument,
} from "../models/deliveryCharge";
import {
  AdminSessionModel,
  decodeAdminSession,
  type AdminSession,
  type AdminSessionDocument,
} from "../models/adminSession";

const CONNECTED = 1;

// Fail fast instead of queueing queries while the database is unreachable.
mongoose.set("bufferCommands", false);

/** Collection backed by a mongoose model; records are decoded at this boundary. */
export class MongoCollection<T extends object, D extends object> implements Collection<T> {
  constructor(
    private readonly model: Model<D>,
    private readonly decode: (raw: unknown) => Stored<T>
  ) {}

  async insert(document: T, options: InsertOptions = {}): Promise<DocumentId> {
    this.ensureConnected();
    try {
      const created = await this.model.create({ ...document, created_at: options.createdAt ?? new Date() });
      return DocumentId.parse(String(created._id));
    } catch (err) {
      throw this.translate(err);
    }
  }

  async find(filter: Filter<T>, sort?: SortSpec): Promise<Stored<T>[]> {
    this.ensureConnected();
    const query = this.model.find().where(toConditions(filter));
    if (sort) query.sort(toSort(sort));
    const documents: unknown[] = await query.lean().exec();
    return documents.map((raw) => this.decode(raw));
  }

  async findOne(filter: Filter<T>, sort?: SortSpec): Promise<Stored<T> | null> {
    this.ensureConnected();
    const query = this.model.findOne().where(toConditions(filter));
    if (sort) query.sort(toSort(sort));
    const raw: unknown = await query.lean().exec();
    return raw ? this.decode(raw) : null;
  }

  async updateOne(filter: Filter<T>, changes: Partial<T>): Promise<number> {
    this.ensureConnected();
    const query = this.model.updateOne().where(toConditions(filter));
    const fields = Object.fromEntries(Object.entries(changes).filter(([, value]) => value !== undefined));
    query.setUpdate({ $set: fields, $currentDate: { updated_at: true } });
    try {
      const result = await query.exec();
      return result.matchedCount;
    } catch (err) {
      throw this.translate(err);
    }
  }

  async deleteOne(filter: Filter<T>): Promise<boolean> {
    this.ensureConnected();
    const result = await this.model.deleteOne().where(toConditions(filter)).exec();
    return result.deletedCount > 0;
  }

  private ensureConnected(): void {
    if (this.model.db.readyState !== CONNECTED) {
      throw new StoreUnavailableError();
    }
  }

  private translate(err: unknown): unknown {
    if (isDuplicateKeyError(err)) {
      return new DuplicateKeyError(this.model.collection.collectionName, duplicateKeyFields(err));
    }
    return err;
  }
}

/** Maps `id` onto `_id` and leaves `$ne` conditions as they are. */
export function toConditions<T>(filter: Filter<T>): Record<string, unknown> {
  const conditions: Record<string, unknown> = {};
  for (const [key, condition] of Object.entries(filter)) {
    if (condition === undefined) continue;
    if (key === "id") {
      conditions._id = toObjectIdCondition(condition);
    } else {
      conditions[key] = condition;
    }
  }
  return conditions;
}

function toObjectIdCondition(condition: unknown): unknown {
  if (condition instanceof DocumentId) {
    return new Types.ObjectId(condition.toString());
  }
  if (isNotEqualCondition<unknown>(condition) && condition.$ne instanceof DocumentId) {
    return { $ne: new Types.ObjectId(condition.$ne.toString()) };
  }
  return condition;
}

// _id breaks ties between documents created in the same millisecond.
const toSort = (sort: SortSpec): Record<string, 1 | -1> => ({
  created_at: sort.created_at,
  _id: sort.created_at,
});

export class MongoDocumentStore implements DocumentStore {
  readonly categories = new MongoCollection<Category, CategoryDocument>(CategoryModel, decodeCategory);
  readonly products = new MongoCollection<Product, ProductDocument>(ProductModel, decodeProduct);
  readonly deliveryCharges = new MongoCollection<DeliveryCharge, DeliveryChargeDocument>(
    DeliveryChargeModel,
    decodeDeliveryCharge
  );
  readonly adminSessions = new MongoCollection<AdminSession, AdminSessionDocument>(
    AdminSessionModel,
    decodeAdminSession
  );

  async status(): Promise<StoreStatus> {
    const connection = mongoose.connection;
    if (connection.readyState !== CONNECTED || !connection.db) {
      return { connected: false, collections: [] };
    }
    try {
      const collections = await connection.db.listCollections({}, { nameOnly: true }).toArray();
      return { connected: true, collections: collections.map((c) => c.name).slice(0, 10) };
    } catch (err) {
      return { connected: true, collections: [], error: err instanceof Error ? err.message : String(err) };
    }
  }
}
