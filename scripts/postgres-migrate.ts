import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Pool } from "pg";
import { makeLogger } from "../src/infra/logger.js";

const logger = makeLogger({ serviceName: "checkout-db-migrate" });

async function main(): Promise<void> {
  const connectionString = process.env.CHECKOUT_POSTGRES_URL?.trim();
  if (!connectionString) {
    throw new Error("CHECKOUT_POSTGRES_URL is required.");
  }

  const migrationPath = resolve(process.cwd(), "sql", "001_checkout_payments.sql");
  const sql = await readFile(migrationPath, "utf8");
  const pool = new Pool({ connectionString });

  try {
    await pool.query(sql);
    logger.info({ migrationPath }, "db:migrate OK");
  } finally {
    await pool.end();
  }
}

await main();
