import "dotenv/config";
import { TokenService } from "./auth.js";
import { loadConfig } from "./config.js";
import { createServices } from "./container.js";
import { openDatabase } from "./storage.js";
import { createWebServer } from "./webServer.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const db = openDatabase(config.databaseFile);
  const services = createServices({
    db,
    tokens: new TokenService(config.tokenSecret, config.tokenTtlSeconds),
  });

  if (config.admin) {
    const { user, created } = await services.users.ensureAdmin(config.admin);
    console.error(
      created
        ? `[Startup] Created administrator ${user.email}`
        : `[Startup] Administrator ${user.email} already exists`
    );
  }

  const app = createWebServer(services);
  const server = app.listen(config.port, () => {
    console.error(`[Startup] Database:     ${config.databaseFile}`);
    console.error(`[Startup] REST API:     http://localhost:${config.port}/api`);
    console.error(`[Startup] MCP endpoint: http://localhost:${config.port}/mcp`);
  });

  const shutdown = (signal: string): void => {
    console.error(`[Shutdown] ${signal} received`);
    server.close(() => {
      services.notifications
        .idle()
        .then(() => db.close())
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("[Fatal]", err);
          process.exit(1);
        });
    });
    server.closeAllConnections();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("[Fatal]", err);
  process.exit(1);
});
