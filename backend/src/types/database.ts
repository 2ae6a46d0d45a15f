/**
 * Database types matching the schema
 */

export interface Category {
  id: number;
  type: string;
}

export interface Question {
  id: number;
  question: string;
  answer: string;
  category_id: number;
  difficulty: number;
}

/**
 * Column values for a new question; absent fields are stored as NULL
 */
export interface NewQuestion {
  question: string | null;
  answer: string | null;
  category_id: number | null;
  difficulty: number | null;
}
