import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import type { Client } from "@libsql/client";
import { createLogger } from "@/lib/logging/logger";

const logger = createLogger("migrations");

export const DEFAULT_MIGRATIONS_DIR = path.resolve(process.cwd(), "lib/db/migrations");

export function splitStatements(sql: string): string[] {
  return sql
    .split(/;\s*\n/g)
    .map((statement) => statement.trim().replace(/;$/, ""))
    .filter(Boolean);
}

export async function runMigrations(
  client: Client,
  migrationsDir = DEFAULT_MIGRATIONS_DIR,
): Promise<string[]> {
  await client.execute(
    "CREATE TABLE IF NOT EXISTS __migrations (file_name TEXT PRIMARY KEY, applied_at INTEGER NOT NULL)",
  );

  const appliedRows = await client.execute("SELECT file_name FROM __migrations");
  const appliedSet = new Set(appliedRows.rows.map((row) => String(row.file_name)));

  const files = (await readdir(migrationsDir))
    .filter((file) => file.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b));

  const applied: string[] = [];

  for (const file of files) {
    if (appliedSet.has(file)) {
      continue;
    }

    const sql = await readFile(path.join(migrationsDir, file), "utf8");
    for (const statement of splitStatements(sql)) {
      await client.execute(statement);
    }

    await client.execute({
      sql: "INSERT INTO __migrations (file_name, applied_at) VALUES (?, ?)",
      args: [file, Date.now()],
    });

    logger.info("Applied migration", { file });
    applied.push(file);
  }

  return applied;
}
