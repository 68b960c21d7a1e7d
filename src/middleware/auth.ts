// middleware/auth.ts
import { Request, Response, NextFunction, RequestHandler } from "express";
import type { AdminSession } from "../models/adminSession";
import type { AdminSessionService } from "../services/AdminSessionService";
import type { Stored } from "../store/documentStore";
import asyncHandler from "./asyncHandler";

export const ADMIN_TOKEN_HEADER = "x-admin-token";

// -------------------- Extend Express Request --------------------
declare global {
  namespace Express {
    interface Request {
      adminSession?: Stored<AdminSession>;
    }
  }
}

/** Guards admin-only routes with the `X-Admin-Token` session token. */
export const requireAdmin = (sessions: AdminSessionService): RequestHandler =>
  asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
    req.adminSession = await sessions.authorize(req.get(ADMIN_TOKEN_HEADER));
    next();
  });
