/**
 * HTTP API for the trivia game
 * Categories, paginated questions, search and quiz play under /api/v1
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import type { Store } from "./lib/db";
import { handleError, handleNotFound } from "./lib/http";
import type { RandomSource } from "./lib/quiz";
import { storeMiddleware, type AppEnv } from "./middleware/store";
import categoriesRouter from "./routes/categories";
import questionsRouter from "./routes/questions";
import quizzesRouter from "./routes/quizzes";

export interface AppOptions {
  db: Store;
  random?: RandomSource;
  corsOrigin?: string;
  logRequests?: boolean;
}

export function createApp(options: AppOptions) {
  const app = new Hono<AppEnv>();

  if (options.logRequests ?? true) {
    app.use("*", logger());
  }

  app.use(
    "/api/*",
    cors({
      origin: options.corsOrigin ?? "*",
      allowHeaders: ["Content-Type", "Authorization"],
      allowMethods: ["GET", "POST", "PATCH", "DELETE", "PUT"],
    })
  );

  app.use("*", storeMiddleware(options.db, options.random ?? Math.random));

  // Health check endpoint
  app.get("/health", (c) => {
    return c.json({ status: "ok" });
  });

  app.route("/api/v1/categories", categoriesRouter);
  app.route("/api/v1/questions", questionsRouter);
  app.route("/api/v1/quizzes", quizzesRouter);

  app.notFound(handleNotFound);
  app.onError(handleError);

  return app;
}

export type App = ReturnType<typeof createApp>;
