// services/AdminSessionService.ts - admin login and token checks
import { createHash, timingSafeEqual } from "crypto";
import { v4 as uuidv4 } from "uuid";
import type { AppConfig } from "../config/appConfig";
import type { AdminSession } from "../models/adminSession";
import type { Collection, Stored } from "../store/documentStore";
import { UnauthorizedError } from "../util/errors";

const HOUR_MS = 60 * 60 * 1000;

export interface LoginResult {
  token: string;
  expires_at: Date;
}

export interface AdminSessionServiceOptions {
  now?: () => Date;
}

// Hashing first gives both sides the same length for timingSafeEqual.
const sameSecret = (given: string, expected: string): boolean =>
  timingSafeEqual(
    createHash("sha256").update(given).digest(),
    createHash("sha256").update(expected).digest()
  );

export class AdminSessionService {
  private readonly now: () => Date;

  constructor(
    private readonly sessions: Collection<AdminSession>,
    private readonly config: Pick<AppConfig, "adminUsername" | "adminPassword" | "sessionTtlHours">,
    options: AdminSessionServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Checks the shared admin credential and opens a session that lasts
   * `sessionTtlHours`. There is no refresh; a new login is needed after expiry.
   */
  async login(username: string, password: string): Promise<LoginResult> {
    const usernameOk = sameSecret(username, this.config.adminUsername);
    const passwordOk = sameSecret(password, this.config.adminPassword);
    if (!usernameOk || !passwordOk) {
      throw new UnauthorizedError("INVALID_CREDENTIALS");
    }

    const createdAt = this.now();
    const session: AdminSession = {
      token: uuidv4().replace(/-/g, ""),
      expires_at: new Date(createdAt.getTime() + this.config.sessionTtlHours * HOUR_MS),
    };
    await this.sessions.insert(session, { createdAt });

    return { token: session.token, expires_at: session.expires_at };
  }

  /** Resolves to the session behind `token`; never extends it. */
  async authorize(token: string | undefined): Promise<Stored<AdminSession>> {
    if (!token) {
      throw new UnauthorizedError("MISSING_TOKEN");
    }
    const session = await this.sessions.findOne({ token });
    if (!session) {
      throw new UnauthorizedError("INVALID_TOKEN");
    }
    if (session.expires_at.getTime() <= this.now().getTime()) {
      throw new UnauthorizedError("SESSION_EXPIRED");
    }
    return session;
  }
}
