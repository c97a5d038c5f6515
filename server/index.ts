// server/index.ts
import dotenv from "dotenv";
import { createApp } from "./app.js";
import { CheckInService } from "./checkins.js";
import { loadConfig } from "./config.js";
import { createStore } from "./storage.js";

dotenv.config();

async function main() {
  const config = loadConfig();

  // one store per process, handed to the service
  const store = createStore(config.storage);
  await store.ensureSchema();

  const service = new CheckInService(store);
  const app = createApp(service, config);

  const server = app.listen(config.port, "0.0.0.0", () => {
    console.log(`✅ Server listening on port ${config.port}`);
    console.log(`✅ Storage driver: ${config.storage.driver}`);
    console.log(`✅ Allowed origins: ${config.allowedOrigins.join(", ")}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch((err) => {
          console.error("❌ Error closing store:", err);
          process.exit(1);
        });
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("❌ Fatal startup error:", err);
  process.exit(1);
});
