/**
 * Seed the trivia database from scripts/data/trivia.json
 *
 * Usage: npm run seed -- [--reset] [--file path/to/data.json]
 */

import "dotenv/config";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { loadConfig } from "../src/config/env";
import { openDatabase } from "../src/lib/db";
import { parseSeedData, seedDatabase } from "../src/lib/seed";

function argValue(flag: string): string | undefined {
  const index = process.argv.indexOf(flag);
  return index === -1 ? undefined : process.argv[index + 1];
}

function main() {
  const config = loadConfig();
  const reset = process.argv.includes("--reset");
  const file =
    argValue("--file") ?? fileURLToPath(new URL("./data/trivia.json", import.meta.url));

  console.log(`Seeding ${config.databasePath} from ${file}${reset ? " (reset)" : ""}`);

  const data = parseSeedData(JSON.parse(readFileSync(file, "utf-8")));
  const db = openDatabase(config.databasePath);

  try {
    const result = seedDatabase(db, data, { reset });
    console.log(`  ✅ ${result.categories} categories, ${result.questions} questions`);
  } finally {
    db.close();
  }
}

try {
  main();
} catch (error) {
  console.error("Seed failed:", error);
  process.exit(1);
}
