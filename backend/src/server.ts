import "dotenv/config";
import { serve } from "@hono/node-server";
import { loadConfig } from "./config/env";
import { openDatabase } from "./lib/db";
import { createApp } from "./index";

const config = loadConfig();
const db = openDatabase(config.databasePath);

const app = createApp({
  db,
  corsOrigin: config.corsOrigin,
  logRequests: config.logRequests,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`Trivia API listening on http://localhost:${info.port}`);
});

function shutdown() {
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
