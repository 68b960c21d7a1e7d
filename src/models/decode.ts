// models/decode.ts - zod pieces shared by the stored-document decoders
import { Types } from "mongoose";
import { z } from "zod";

export const objectIdField = z.instanceof(Types.ObjectId);

// Older documents may hold explicit nulls for optional fields.
export const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);
