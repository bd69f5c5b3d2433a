import type pg from "pg";
import path from "path";

const migrations: { name: string; sql: string }[] = [
  {
    name: "financial_documents table",
    sql: `CREATE TABLE IF NOT EXISTS financial_documents (
            id integer GENERATED BY DEFAULT AS IDENTITY PRIMARY KEY,
            university text NOT NULL,
            year integer,
            year_label text,
            source_url text,
            document_path text,
            text_path text,
            structured_path text,
            page_count integer,
            acquired_at timestamp,
            created_at timestamp NOT NULL DEFAULT now()
          )`,
  },
  {
    name: "uq_financial_documents_university_year (one row per university and year)",
    sql: `CREATE UNIQUE INDEX IF NOT EXISTS uq_financial_documents_university_year
           ON financial_documents (university, year)
           WHERE year IS NOT NULL`,
  },
  {
    name: "idx_financial_documents_placeholders (partial index for outstanding work)",
    sql: `CREATE INDEX IF NOT EXISTS idx_financial_documents_placeholders
           ON financial_documents (university)
           WHERE document_path IS NULL`,
  },
];

export async function runMigrations(pool: Pick<pg.Pool, "query">): Promise<number> {
  let applied = 0;
  for (const { name, sql } of migrations) {
    try {
      await pool.query(sql);
      applied++;
    } catch (err) {
      console.warn(`Migration skipped (${name}): ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return applied;
}

// Only when run directly; bundled entry points import runMigrations
if (/^migrate\.[cm]?[jt]s$/.test(path.basename(process.argv[1] ?? ""))) {
  const { pool } = await import("./db");
  if (!pool) {
    console.error("❌ DATABASE_URL is not set; nothing to migrate");
    process.exit(1);
  }
  const applied = await runMigrations(pool);
  console.log(`✅ Applied ${applied}/${migrations.length} migrations`);
  await pool.end();
}
