/**
 * Test Helper Functions
 * Utilities for building an app over an in-memory store and creating test data
 */

import { createApp, type App } from "../index";
import { openDatabase, type Store } from "../lib/db";
import type { RandomSource } from "../lib/quiz";

/**
 * Fresh in-memory database with the schema applied
 */
export function createTestDatabase(): Store {
  return openDatabase(":memory:");
}

/**
 * App bound to `db`, with request logging off
 * @param random - Random source for quiz selection (default: Math.random)
 */
export function createTestApp(db: Store, random?: RandomSource): App {
  return createApp({ db, random, logRequests: false });
}

/**
 * Create a test category
 */
export function createTestCategory(db: Store, id: number, type: string): void {
  db.prepare("INSERT INTO categories (id, type) VALUES (?, ?)").run(id, type);
}

/**
 * Create a test question
 * @returns Question ID
 */
export function createTestQuestion(
  db: Store,
  categoryId: number,
  questionText: string = "What is the boiling point of water in Celsius?",
  answerText: string = "100",
  difficulty: number = 1
): number {
  const result = db
    .prepare(
      `INSERT INTO questions (question, answer, category_id, difficulty)
       VALUES (?, ?, ?, ?)`
    )
    .run(questionText, answerText, categoryId, difficulty);

  return Number(result.lastInsertRowid);
}

/**
 * Create `count` numbered questions in one category
 * @returns Question IDs in insertion order
 */
export function createTestQuestions(
  db: Store,
  categoryId: number,
  count: number
): number[] {
  const ids: number[] = [];
  for (let i = 1; i <= count; i++) {
    ids.push(createTestQuestion(db, categoryId, `Question ${i}`, `Answer ${i}`, 1));
  }
  return ids;
}

/**
 * Send a JSON request through the app without a network
 */
export function sendJson(
  app: App,
  path: string,
  body: unknown,
  method: string = "POST"
): Promise<Response> {
  return Promise.resolve(
    app.request(path, {
      method,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    })
  );
}
