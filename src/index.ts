// index.ts - process entry point
import dotenv from "dotenv";
dotenv.config();

import http from "http";
import { createApp } from "./app";
import { loadConfig } from "./config/appConfig";
import { connectDatabase, disconnectDatabase } from "./config/database";
import { MongoDocumentStore } from "./store/mongoStore";

const config = loadConfig();
const store = new MongoDocumentStore();
const server = http.createServer(createApp({ config, store }));

const start = async () => {
  // A failed connection is reported on /test; routes answer 503 until it is back.
  // A failed index build rejects and stops startup.
  const connected = await connectDatabase(config);
  if (!connected) {
    console.warn("⚠️ Starting without a database connection");
  }

  server.listen(config.port, "0.0.0.0", () => {
    console.log(`🚀 Server running on port ${config.port}`);
  });
};

const shutdown = (signal: string) => {
  console.log(`👋 ${signal} received, closing server gracefully`);
  server.close(() => {
    disconnectDatabase()
      .then(() => {
        console.log("✅ Server closed");
        process.exit(0);
      })
      .catch((err: unknown) => {
        console.error("❌ Error while closing the database connection:", err);
        process.exit(1);
      });
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

process.on("unhandledRejection", (err: unknown) => {
  console.error("❌ Unhandled Rejection:", err instanceof Error ? err.message : err);
  server.close(() => process.exit(1));
});

start().catch((err: unknown) => {
  console.error("❌ Failed to start server:", err);
  process.exit(1);
});
