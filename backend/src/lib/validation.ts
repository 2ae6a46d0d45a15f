/**
 * Request-shape schemas for the JSON endpoints
 */

import { z } from "zod";
import type { NewQuestion } from "../types/database";

export type ValidationResult<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Marker sent as `quiz_category.type` when the quiz spans every category
 */
export const ALL_CATEGORIES = "click";

export const pageQuerySchema = z.coerce.number().int().positive().default(1);

// Every field may be missing or null; the store decides what is required
export const createQuestionSchema = z.object({
  question: z.string().nullish(),
  answer: z.string().nullish(),
  category_id: z.number().int().nullish(),
  difficulty: z.number().int().nullish(),
});

export const searchSchema = z.object({
  search_term: z.string(),
});

const previousQuestionsSchema = z.array(z.number().int());
const categoryIdSchema = z.number().int();

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");
}

export function parsePage(raw: string | undefined): ValidationResult<number, string> {
  const parsed = pageQuerySchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: "page must be a positive integer" };
  }
  return { ok: true, value: parsed.data };
}

export function parseNewQuestion(body: unknown): ValidationResult<NewQuestion, string> {
  const parsed = createQuestionSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, error: formatIssues(parsed.error) };
  }

  const { question, answer, category_id, difficulty } = parsed.data;
  return {
    ok: true,
    value: {
      question: question ?? null,
      answer: answer ?? null,
      category_id: category_id ?? null,
      difficulty: difficulty ?? null,
    },
  };
}

export function parseSearchTerm(body: unknown): ValidationResult<string, string> {
  const parsed = searchSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, error: "search_term is required" };
  }
  return { ok: true, value: parsed.data.search_term };
}

export type QuizScope = { kind: "all" } | { kind: "category"; categoryId: number };

export interface QuizRequest {
  previousQuestions: number[];
  scope: QuizScope;
}

export type QuizValidationError =
  | "missing_previous_questions"
  | "invalid_previous_questions"
  | "missing_category_type"
  | "category_type_not_object"
  | "invalid_category_id";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Checks a quiz body in a fixed order and stops at the first problem
 */
export function parseQuizRequest(
  body: unknown
): ValidationResult<QuizRequest, QuizValidationError> {
  const fields = isRecord(body) ? body : {};

  const previous = fields.previous_questions;
  if (previous === undefined || previous === null) {
    return { ok: false, error: "missing_previous_questions" };
  }
  const previousParsed = previousQuestionsSchema.safeParse(previous);
  if (!previousParsed.success) {
    return { ok: false, error: "invalid_previous_questions" };
  }

  const quizCategory = isRecord(fields.quiz_category) ? fields.quiz_category : {};
  const type = quizCategory.type;
  if (type === undefined || type === null) {
    return { ok: false, error: "missing_category_type" };
  }

  if (type === ALL_CATEGORIES) {
    return {
      ok: true,
      value: { previousQuestions: previousParsed.data, scope: { kind: "all" } },
    };
  }

  if (!isRecord(type)) {
    return { ok: false, error: "category_type_not_object" };
  }

  const categoryId = categoryIdSchema.safeParse(type.id);
  if (!categoryId.success) {
    return { ok: false, error: "invalid_category_id" };
  }

  return {
    ok: true,
    value: {
      previousQuestions: previousParsed.data,
      scope: { kind: "category", categoryId: categoryId.data },
    },
  };
}
