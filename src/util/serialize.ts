// util/serialize.ts
import { DocumentId, type Stored } from "../store/documentStore";

export type WireValue = string | number | boolean | null | WireValue[] | { [key: string]: WireValue };

export type WireDocument = { id: string } & { [key: string]: WireValue };

function toWire(value: unknown): WireValue | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof DocumentId) return value.toString();
  if (Array.isArray(value)) {
    return value.map((item) => toWire(item) ?? null);
  }
  if (typeof value === "object") {
    const out: { [key: string]: WireValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const wire = toWire(item);
      if (wire !== undefined) out[key] = wire;
    }
    return out;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return String(value);
}

/**
 * Renders a stored record for the response body: the id as a string under
 * `id`, dates as ISO-8601 text, absent optional fields left out.
 */
export function serializeDocument<T extends object>(record: Stored<T>): WireDocument {
  const { id, ...fields } = record;
  const out: WireDocument = { id: id.toString() };
  for (const [key, value] of Object.entries(fields)) {
    const wire = toWire(value);
    if (wire !== undefined) out[key] = wire;
  }
  return out;
}
