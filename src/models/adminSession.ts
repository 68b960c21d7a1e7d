// models/adminSession.ts
import mongoose, { Schema } from "mongoose";
import { z } from "zod";
import { DocumentId, type Stored } from "../store/documentStore";
import { objectIdField } from "./decode";

export interface AdminSession {
  token: string;
  expires_at: Date;
}

export interface AdminSessionDocument extends AdminSession {
  created_at: Date;
}

// Expired sessions are rejected on lookup and never purged.
const AdminSessionSchema = new Schema<AdminSessionDocument>(
  {
    token: { type: String, required: true, unique: true },
    created_at: { type: Date, required: true },
    expires_at: { type: Date, required: true },
  },
  { versionKey: false }
);

export const AdminSessionModel = mongoose.model<AdminSessionDocument>(
  "AdminSession",
  AdminSessionSchema,
  "adminsession"
);

const StoredAdminSession = z.object({
  _id: objectIdField,
  token: z.string(),
  created_at: z.date(),
  expires_at: z.date(),
});

export const decodeAdminSession = (raw: unknown): Stored<AdminSession> => {
  const { _id, ...fields } = StoredAdminSession.parse(raw);
  return { ...fields, id: DocumentId.parse(_id.toHexString()) };
};
