import type { Store } from "./db";
import type { NewQuestion, Question } from "../types/database";

export const QUESTIONS_PER_PAGE = 10;

const QUESTION_COLUMNS = "id, question, answer, category_id, difficulty";

export interface QuestionPage {
  questions: Question[];
  total: number;
  pages: number;
}

/**
 * One page of questions in id order, plus the totals needed to bound `page`
 */
export function getQuestionPage(db: Store, page: number): QuestionPage {
  const total = countQuestions(db);
  const pages = Math.ceil(total / QUESTIONS_PER_PAGE);

  // Past the last page there is nothing to fetch, and a huge page would
  // overflow the OFFSET binding
  if (page > pages) {
    return { questions: [], total, pages };
  }

  const offset = (page - 1) * QUESTIONS_PER_PAGE;

  const questions = db
    .prepare<[number, number], Question>(
      `SELECT ${QUESTION_COLUMNS}
       FROM questions
       ORDER BY id
       LIMIT ? OFFSET ?`
    )
    .all(QUESTIONS_PER_PAGE, offset);

  return { questions, total, pages };
}

export function countQuestions(db: Store): number {
  const result = db
    .prepare<[], { count: number }>("SELECT COUNT(*) as count FROM questions")
    .get();

  return result?.count ?? 0;
}

export function getQuestionsByCategory(db: Store, categoryId: number): Question[] {
  return db
    .prepare<[number], Question>(
      `SELECT ${QUESTION_COLUMNS}
       FROM questions
       WHERE category_id = ?
       ORDER BY id`
    )
    .all(categoryId);
}

export function findQuestion(db: Store, id: number): Question | null {
  const question = db
    .prepare<[number], Question>(
      `SELECT ${QUESTION_COLUMNS} FROM questions WHERE id = ?`
    )
    .get(id);

  return question ?? null;
}

/**
 * Inserts a question and returns its id. Constraint failures are left to
 * the caller as store errors.
 */
export function insertQuestion(db: Store, input: NewQuestion): number {
  const result = db
    .prepare<[string | null, string | null, number | null, number | null]>(
      `INSERT INTO questions (question, answer, category_id, difficulty)
       VALUES (?, ?, ?, ?)`
    )
    .run(input.question, input.answer, input.category_id, input.difficulty);

  return Number(result.lastInsertRowid);
}

/**
 * Returns false when no row had that id
 */
export function deleteQuestion(db: Store, id: number): boolean {
  const result = db
    .prepare<[number]>("DELETE FROM questions WHERE id = ?")
    .run(id);

  return result.changes > 0;
}

// LIKE treats % and _ as wildcards; match the term literally
function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Case-insensitive substring match on the question text. Both sides go
 * through casefold() since LIKE alone only folds ASCII letters.
 */
export function searchQuestions(db: Store, term: string): Question[] {
  return db
    .prepare<[string], Question>(
      `SELECT ${QUESTION_COLUMNS}
       FROM questions
       WHERE casefold(question) LIKE casefold(?) ESCAPE '\\'
       ORDER BY id`
    )
    .all(`%${escapeLike(term)}%`);
}

/**
 * Ids of every question, or only those in one category
 */
export function getQuestionIds(db: Store, categoryId?: number): number[] {
  const rows =
    categoryId === undefined
      ? db.prepare<[], { id: number }>("SELECT id FROM questions ORDER BY id").all()
      : db
          .prepare<[number], { id: number }>(
            "SELECT id FROM questions WHERE category_id = ? ORDER BY id"
          )
          .all(categoryId);

  return rows.map((row) => row.id);
}
