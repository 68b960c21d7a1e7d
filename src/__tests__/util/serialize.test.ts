import { describe, it, expect } from "vitest";
import type { Category } from "../../models/category";
import type { DeliveryCharge } from "../../models/deliveryCharge";
import { DocumentId, type Stored } from "../../store/documentStore";
import { InvalidIdentifierError } from "../../util/errors";
import { serializeDocument } from "../../util/serialize";

describe("serializeDocument", () => {
  it("renders the id as a string and dates as ISO-8601", () => {
    const record: Stored<Category> = {
      id: DocumentId.parse("64b7f0c2a1b2c3d4e5f60718"),
      name: "Shoes",
      slug: "shoes",
      description: undefined,
      is_active: true,
      created_at: new Date("2025-01-02T03:04:05.000Z"),
      updated_at: new Date("2025-01-03T00:00:00.000Z"),
    };

    expect(serializeDocument(record)).toEqual({
      id: "64b7f0c2a1b2c3d4e5f60718",
      name: "Shoes",
      slug: "shoes",
      is_active: true,
      created_at: "2025-01-02T03:04:05.000Z",
      updated_at: "2025-01-03T00:00:00.000Z",
    });
  });

  it("leaves out absent optional fields", () => {
    const record: Stored<Category> = {
      id: DocumentId.parse("64b7f0c2a1b2c3d4e5f60718"),
      name: "Shoes",
      slug: "shoes",
      description: undefined,
      is_active: false,
      created_at: new Date("2025-01-02T03:04:05.000Z"),
    };

    const wire = serializeDocument(record);
    expect(Object.keys(wire).sort()).toEqual(["created_at", "id", "is_active", "name", "slug"]);
  });

  it("keeps nested rate objects in order", () => {
    const record: Stored<DeliveryCharge> = {
      id: DocumentId.parse("64b7f0c2a1b2c3d4e5f60719"),
      name: "Standard Delivery",
      rates: [
        { location: "Inside City", charge: 60 },
        { location: "Outside City", charge: 120 },
      ],
      created_at: new Date("2025-01-02T03:04:05.000Z"),
    };

    expect(serializeDocument(record).rates).toEqual([
      { location: "Inside City", charge: 60 },
      { location: "Outside City", charge: 120 },
    ]);
  });
});

describe("DocumentId", () => {
  it("accepts 24 hex characters and normalizes case", () => {
    const id = DocumentId.parse("64B7F0C2A1B2C3D4E5F60718");
    expect(id.toString()).toBe("64b7f0c2a1b2c3d4e5f60718");
    expect(JSON.stringify({ id })).toBe('{"id":"64b7f0c2a1b2c3d4e5f60718"}');
  });

  it("compares by value", () => {
    const a = DocumentId.parse("64b7f0c2a1b2c3d4e5f60718");
    expect(a.equals(DocumentId.parse("64b7f0c2a1b2c3d4e5f60718"))).toBe(true);
    expect(a.equals(DocumentId.parse("64b7f0c2a1b2c3d4e5f60719"))).toBe(false);
  });

  it.each(["", "not-an-id", "64b7f0c2a1b2c3d4e5f6071", "64b7f0c2a1b2c3d4e5f6071z"])(
    "rejects %j",
    (raw) => {
      expect(() => DocumentId.parse(raw)).toThrow(InvalidIdentifierError);
    }
  );
});
