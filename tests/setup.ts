import { rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterAll } from "vitest";
import { nanoid } from "nanoid";

// Each test file gets its own SQLite database.
const databaseFile = path.join(os.tmpdir(), `forkbench-test-${nanoid(10)}.db`);
process.env.DATABASE_URL = `file:${databaseFile}`;

afterAll(() => {
  rmSync(databaseFile, { force: true });
});
