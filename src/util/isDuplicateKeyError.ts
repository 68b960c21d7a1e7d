/**
 * Detects a MongoDB unique-index violation (E11000), whether it comes from
 * the driver directly or wrapped by mongoose.
 */
export function isDuplicateKeyError(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  if ("code" in err && err.code === 11000) return true;
  const message = "message" in err && typeof err.message === "string" ? err.message : "";
  return message.toLowerCase().includes("e11000");
}

/** Field names named in a duplicate-key error's `keyValue`, if the driver sent one. */
export function duplicateKeyFields(err: unknown): string[] {
  if (typeof err !== "object" || err === null || !("keyValue" in err)) return [];
  const { keyValue } = err;
  return typeof keyValue === "object" && keyValue !== null ? Object.keys(keyValue) : [];
}
