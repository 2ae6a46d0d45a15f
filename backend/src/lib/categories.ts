import type { Store } from "./db";
import type { Category } from "../types/database";

export function listCategories(db: Store): Category[] {
  return db
    .prepare<[], Category>("SELECT id, type FROM categories ORDER BY id")
    .all();
}

export function findCategory(db: Store, id: number): Category | null {
  const category = db
    .prepare<[number], Category>("SELECT id, type FROM categories WHERE id = ?")
    .get(id);

  return category ?? null;
}
