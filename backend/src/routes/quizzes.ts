/**
 * Quiz play route
 */

import { Hono } from "hono";
import { httpError, methodNotAllowed, readJsonBody } from "../lib/http";
import { selectQuizQuestion } from "../lib/quiz";
import { parseQuizRequest } from "../lib/validation";
import type { AppEnv } from "../middleware/store";

const quizzes = new Hono<AppEnv>();

/**
 * POST /api/v1/quizzes
 * Body: { previous_questions: number[], quiz_category: { type: "click" | { id } } }
 * Returns a random unseen question, or null once the pool is used up
 */
quizzes.post("/", async (c) => {
  const body = await readJsonBody(c);

  const request = parseQuizRequest(body);
  if (!request.ok) {
    throw httpError(422);
  }

  const result = selectQuizQuestion(c.get("db"), request.value, c.get("random"));
  if (!result.ok) {
    throw httpError(422);
  }

  return c.json({
    question: result.question,
    questions_per_play: result.questionsPerPlay,
    success: true,
    status: 200,
  });
});

quizzes.all("/", methodNotAllowed);

export default quizzes;
