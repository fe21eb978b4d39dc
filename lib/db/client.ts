import { mkdirSync } from "node:fs";
import path from "node:path";
import { createClient, type Client } from "@libsql/client";
import { drizzle, type LibSQLDatabase } from "drizzle-orm/libsql";
import * as schema from "@/lib/db/schema";
import { getEnv } from "@/lib/config/env";
import { runMigrations } from "@/lib/db/migrate";

type DbState = {
  url: string;
  client: Client;
  db: LibSQLDatabase<typeof schema>;
  migrationPromise: Promise<string[]>;
};

export function ensureSqliteDirectory(databaseUrl: string): void {
  if (!databaseUrl.startsWith("file:")) {
    return;
  }

  const filePath = databaseUrl.replace(/^file:/, "");
  const absolute = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
  mkdirSync(path.dirname(absolute), { recursive: true });
}

function createDbState(): DbState {
  const env = getEnv();
  ensureSqliteDirectory(env.DATABASE_URL);

  const client = createClient({
    url: env.DATABASE_URL,
  });

  const db = drizzle(client, { schema });
  const migrationPromise = runMigrations(client);

  return { url: env.DATABASE_URL, client, db, migrationPromise };
}

const globalState = globalThis as typeof globalThis & { __forkbenchDb?: DbState };

function getState(): DbState {
  const current = globalState.__forkbenchDb;
  if (current && current.url === getEnv().DATABASE_URL) {
    return current;
  }

  current?.client.close();
  const next = createDbState();
  globalState.__forkbenchDb = next;
  return next;
}

export async function getDb(): Promise<LibSQLDatabase<typeof schema>> {
  const state = getState();
  await state.migrationPromise;
  return state.db;
}
