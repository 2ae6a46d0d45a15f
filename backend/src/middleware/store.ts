/**
 * Hands the store and random source to each request through the context
 */

import { createMiddleware } from "hono/factory";
import type { Store } from "../lib/db";
import type { RandomSource } from "../lib/quiz";

export type AppVariables = {
  db: Store;
  random: RandomSource;
};

export type AppEnv = {
  Variables: AppVariables;
};

export function storeMiddleware(db: Store, random: RandomSource) {
  return createMiddleware<AppEnv>(async (c, next) => {
    c.set("db", db);
    c.set("random", random);
    await next();
  });
}
