/**
 * Loads categories and questions into the store in one transaction
 */

import { z } from "zod";
import type { Store } from "./db";

export const seedDataSchema = z.object({
  categories: z.array(
    z.object({
      id: z.number().int().positive(),
      type: z.string().min(1),
    })
  ),
  questions: z.array(
    z.object({
      question: z.string().min(1),
      answer: z.string().min(1),
      category_id: z.number().int().positive(),
      difficulty: z.number().int().min(1).max(5),
    })
  ),
});

export type SeedData = z.infer<typeof seedDataSchema>;

export interface SeedResult {
  categories: number;
  questions: number;
}

export interface SeedOptions {
  reset?: boolean;
}

export function parseSeedData(raw: unknown): SeedData {
  const parsed = seedDataSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid seed data - ${problems}`);
  }
  return parsed.data;
}

export function seedDatabase(
  db: Store,
  data: SeedData,
  options: SeedOptions = {}
): SeedResult {
  const insertCategory = db.prepare<[number, string]>(
    `INSERT INTO categories (id, type) VALUES (?, ?)
     ON CONFLICT(id) DO UPDATE SET type = excluded.type`
  );
  // Questions are keyed by their text, so a re-run skips what is already stored
  const insertQuestion = db.prepare<[string, string, number, number, string]>(
    `INSERT INTO questions (question, answer, category_id, difficulty)
     SELECT ?, ?, ?, ?
     WHERE NOT EXISTS (SELECT 1 FROM questions WHERE question = ?)`
  );

  const run = db.transaction((seed: SeedData): SeedResult => {
    if (options.reset) {
      // Questions first, they reference categories
      db.exec("DELETE FROM questions; DELETE FROM categories;");
    }

    for (const category of seed.categories) {
      insertCategory.run(category.id, category.type);
    }
    let inserted = 0;
    for (const question of seed.questions) {
      const result = insertQuestion.run(
        question.question,
        question.answer,
        question.category_id,
        question.difficulty,
        question.question
      );
      inserted += result.changes;
    }

    return {
      categories: seed.categories.length,
      questions: inserted,
    };
  });

  return run(data);
}
