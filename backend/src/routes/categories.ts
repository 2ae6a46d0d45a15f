/**
 * Category API routes
 */

import { Hono } from "hono";
import { findCategory, listCategories } from "../lib/categories";
import { getQuestionsByCategory } from "../lib/questions";
import { methodNotAllowed } from "../lib/http";
import type { AppEnv } from "../middleware/store";

const categories = new Hono<AppEnv>();

/**
 * GET /api/v1/categories
 * List every category in id order
 */
categories.get("/", (c) => {
  const db = c.get("db");

  return c.json({
    categories: listCategories(db),
    success: true,
  });
});

categories.all("/", methodNotAllowed);

/**
 * GET /api/v1/categories/:id/questions
 * All questions of one category, unpaginated
 */
categories.get("/:id{[0-9]+}/questions", (c) => {
  const db = c.get("db");
  const categoryId = Number(c.req.param("id"));

  const category = findCategory(db, categoryId);

  if (!category) {
    return c.json(
      {
        category_id: categoryId,
        success: false,
        status: 404,
        message:
          "The category specified in the URL doesn't exist. Please resubmit with a correct category id.",
      },
      404
    );
  }

  const questions = getQuestionsByCategory(db, category.id);

  return c.json({
    questions,
    total_questions: questions.length,
    current_category: category.id,
    success: true,
  });
});

export default categories;
