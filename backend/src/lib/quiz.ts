/**
 * Quiz play: picks a random question the player has not seen yet
 */

import type { Store } from "./db";
import { findCategory } from "./categories";
import { findQuestion, getQuestionIds } from "./questions";
import type { QuizRequest } from "./validation";
import type { Question } from "../types/database";

export const MAX_QUESTIONS_PER_PLAY = 5;

/**
 * Returns a float in [0, 1), like Math.random
 */
export type RandomSource = () => number;

export type QuizResult =
  | { ok: true; question: Question | null; questionsPerPlay: number }
  | { ok: false; error: "unknown_category" };

export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
  // Clamp in case a custom source returns 1
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}

/**
 * `questionsPerPlay` follows the size of the whole pool, not of what is
 * left, so it stays the same for every call in a session.
 * A null question means the pool is exhausted.
 */
export function selectQuizQuestion(
  db: Store,
  request: QuizRequest,
  random: RandomSource = Math.random
): QuizResult {
  let pool: number[];

  if (request.scope.kind === "all") {
    pool = getQuestionIds(db);
  } else {
    if (!findCategory(db, request.scope.categoryId)) {
      return { ok: false, error: "unknown_category" };
    }
    pool = getQuestionIds(db, request.scope.categoryId);
  }

  const seen = new Set(request.previousQuestions);
  const remaining = pool.filter((id) => !seen.has(id));
  const questionsPerPlay = Math.min(MAX_QUESTIONS_PER_PLAY, pool.length);

  if (remaining.length === 0) {
    return { ok: true, question: null, questionsPerPlay };
  }

  const question = findQuestion(db, pickRandom(remaining, random));

  return { ok: true, question, questionsPerPlay };
}
