// app.ts - express app factory; index.ts wires it to MongoDB and a port
import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import type { AppConfig } from "./config/appConfig";
import { createHealthController } from "./controllers/healthController";
import { createErrorHandler, notFoundHandler } from "./middleware/errorHandler";
import { ADMIN_TOKEN_HEADER } from "./middleware/auth";
import { AdminSessionService } from "./services/AdminSessionService";
import type { DocumentStore } from "./store/documentStore";

// Import routers
import { createCategoryRouter } from "./routes/categoryRoutes";
import { createProductRouter } from "./routes/productRoutes";
import { createDeliveryRouter } from "./routes/deliveryRoutes";
import { createAdminRouter } from "./routes/adminRoutes";

export interface AppDependencies {
  config: AppConfig;
  store: DocumentStore;
  /** Clock for session expiry checks. */
  now?: () => Date;
}

export function createApp({ config, store, now }: AppDependencies) {
  const app = express();
  const sessions = new AdminSessionService(store.adminSessions, config, { now });
  const health = createHealthController(config, store);

  // Middleware
  app.use(
    cors({
      origin: config.corsOrigins.length > 0 ? config.corsOrigins : "*",
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With", ADMIN_TOKEN_HEADER],
    })
  );
  app.use(helmet());
  app.use(express.json({ limit: "1mb" }));
  if (config.nodeEnv !== "test") {
    app.use(morgan("dev"));
  }

  // Health check
  app.get("/", health.liveness);
  app.get("/test", health.diagnostics);

  // Routes
  app.use("/api/categories", createCategoryRouter(store));
  app.use("/api/products", createProductRouter(store));
  app.use("/api/delivery", createDeliveryRouter(store));
  app.use("/api/admin", createAdminRouter(store, sessions));

  app.use(notFoundHandler);
  app.use(createErrorHandler(config));

  return app;
}
