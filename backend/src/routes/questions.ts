/**
 * Question API routes
 * Listing, creation, deletion and search
 */

import { Hono } from "hono";
import { listCategories } from "../lib/categories";
import { isStoreError } from "../lib/db";
import { httpError, methodNotAllowed, readJsonBody } from "../lib/http";
import {
  deleteQuestion,
  findQuestion,
  getQuestionPage,
  insertQuestion,
  searchQuestions,
} from "../lib/questions";
import { parseNewQuestion, parsePage, parseSearchTerm } from "../lib/validation";
import type { AppEnv } from "../middleware/store";

const questions = new Hono<AppEnv>();

/**
 * GET /api/v1/questions?page=N
 * Ten questions per page, with the category list and total count
 */
questions.get("/", (c) => {
  const db = c.get("db");

  const page = parsePage(c.req.query("page"));
  if (!page.ok) {
    throw httpError(400, page.error);
  }

  const result = getQuestionPage(db, page.value);

  // Page 1 is always served, even when the store is empty
  if (page.value > result.pages && page.value > 1) {
    throw httpError(404);
  }

  return c.json({
    questions: result.questions,
    categories: listCategories(db),
    current_category: null,
    success: true,
    total_questions: result.total,
  });
});

/**
 * POST /api/v1/questions
 * Insert a question; the request body is echoed back either way
 */
questions.post("/", async (c) => {
  const db = c.get("db");
  const body = await readJsonBody(c);

  const input = parseNewQuestion(body);
  if (!input.ok) {
    return c.json(
      { question_input: body, success: false, status: 422, message: input.error },
      422
    );
  }

  try {
    insertQuestion(db, input.value);
  } catch (error) {
    if (!isStoreError(error)) {
      throw error;
    }
    console.error("Create question error:", error);
    return c.json(
      { question_input: body, success: false, status: 422, message: error.message },
      422
    );
  }

  return c.json(
    {
      question_input: body,
      success: true,
      status: 201,
      message: "The question was added to the database",
    },
    201
  );
});

questions.all("/", methodNotAllowed);

/**
 * POST /api/v1/questions/search
 * Case-insensitive substring search on the question text
 */
questions.post("/search", async (c) => {
  const db = c.get("db");
  const body = await readJsonBody(c);

  const term = parseSearchTerm(body);
  if (!term.ok) {
    throw httpError(400, term.error);
  }

  const matches = searchQuestions(db, term.value);

  return c.json({
    questions: matches,
    total_questions: matches.length,
    current_category: null,
    success: true,
    status: 200,
  });
});

questions.all("/search", methodNotAllowed);

/**
 * DELETE /api/v1/questions/:id
 * 204 with no body on success
 */
questions.delete("/:id{[0-9]+}", (c) => {
  const db = c.get("db");
  const questionId = Number(c.req.param("id"));

  const missing = () =>
    c.json(
      {
        question_id: questionId,
        success: false,
        status: 404,
        message:
          "The question specified in the URL doesn't exist. Please resubmit with a correct question id",
      },
      404
    );

  if (!findQuestion(db, questionId)) {
    return missing();
  }

  let deleted: boolean;
  try {
    deleted = deleteQuestion(db, questionId);
  } catch (error) {
    if (!isStoreError(error)) {
      throw error;
    }
    console.error("Delete question error:", error);
    return c.json(
      { question_id: questionId, success: false, status: 422, message: error.message },
      422
    );
  }

  // Another request may have removed it since the lookup
  if (!deleted) {
    return missing();
  }

  return c.body(null, 204);
});

questions.all("/:id{[0-9]+}", methodNotAllowed);

export default questions;
