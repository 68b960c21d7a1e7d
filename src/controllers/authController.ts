// controllers/authController.ts
import { Request, Response } from "express";
import asyncHandler from "../middleware/asyncHandler";
import type { AdminSessionService } from "../services/AdminSessionService";
import { parsePayload } from "../validation/parse";
import { loginSchema } from "../validation/authValidation";

export const createAuthController = (sessions: AdminSessionService) => {
  // POST /api/admin/login
  const login = asyncHandler(async (req: Request, res: Response) => {
    const { username, password } = parsePayload(loginSchema, req.body);
    const { token, expires_at } = await sessions.login(username, password);

    res.status(200).json({ token, expires_at: expires_at.toISOString() });
  });

  return { login };
};
