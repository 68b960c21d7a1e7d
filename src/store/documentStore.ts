// store/documentStore.ts
import { InvalidIdentifierError } from "../util/errors";
import type { Category } from "../models/category";
import type { Product } from "../models/product";
import type { DeliveryCharge } from "../models/deliveryCharge";
import type { AdminSession } from "../models/adminSession";

const ID_PATTERN = /^[0-9a-fA-F]{24}$/;

/**
 * Opaque identifier assigned by the store. Only store adapters create one;
 * everything else compares it or turns it into a string.
 */
export class DocumentId {
  private constructor(private readonly value: string) {}

  /** Accepts a 24-character hex string, the only id format the stores issue. */
  static parse(raw: string): DocumentId {
    if (!ID_PATTERN.test(raw)) {
      throw new InvalidIdentifierError();
    }
    return new DocumentId(raw.toLowerCase());
  }

  equals(other: DocumentId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

export type Stored<T> = T & {
  id: DocumentId;
  created_at: Date;
  updated_at?: Date;
};

export type Condition<V> = V | { $ne: V };

export type Filter<T> = { id?: Condition<DocumentId> } & {
  [K in keyof T]?: Condition<T[K]>;
};

export type SortSpec = { created_at: 1 | -1 };

export interface InsertOptions {
  createdAt?: Date;
}

export interface Collection<T extends object> {
  insert(document: T, options?: InsertOptions): Promise<DocumentId>;
  find(filter: Filter<T>, sort?: SortSpec): Promise<Stored<T>[]>;
  findOne(filter: Filter<T>, sort?: SortSpec): Promise<Stored<T> | null>;
  /** Merges `changes` and stamps `updated_at`; resolves to the matched count. */
  updateOne(filter: Filter<T>, changes: Partial<T>): Promise<number>;
  deleteOne(filter: Filter<T>): Promise<boolean>;
}

export interface StoreStatus {
  connected: boolean;
  collections: string[];
  error?: string;
}

export interface DocumentStore {
  categories: Collection<Category>;
  products: Collection<Product>;
  deliveryCharges: Collection<DeliveryCharge>;
  adminSessions: Collection<AdminSession>;
  /** Never rejects; failures are reported through `error`. */
  status(): Promise<StoreStatus>;
}

/** Thrown by a collection when a write would break a unique index. */
export class DuplicateKeyError extends Error {
  constructor(public readonly collection: string, public readonly keys: string[]) {
    super(`Duplicate key in ${collection}: ${keys.join(", ")}`);
    this.name = "DuplicateKeyError";
  }
}

export const isNotEqualCondition = <V>(condition: Condition<V>): condition is { $ne: V } =>
  typeof condition === "object" &&
  condition !== null &&
  !(condition instanceof DocumentId) &&
  !(condition instanceof Date) &&
  !Array.isArray(condition) &&
  "$ne" in condition;
