import { pgTable, text, integer, timestamp } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

/**
 * One row per acquired (or expected) financial statement. `year` is the ending
 * calendar year of the financial period (2022-23 → 2023); null when the year
 * could not be determined. Rows without a documentPath are placeholders for
 * planned acquisitions.
 */
export const financialDocuments = pgTable("financial_documents", {
  id: integer("id").primaryKey().generatedByDefaultAsIdentity(),
  university: text("university").notNull(),
  year: integer("year"),
  yearLabel: text("year_label"),
  sourceUrl: text("source_url"),
  documentPath: text("document_path"),
  textPath: text("text_path"),
  structuredPath: text("structured_path"),
  pageCount: integer("page_count"),
  acquiredAt: timestamp("acquired_at"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

export const insertFinancialDocumentSchema = createInsertSchema(financialDocuments).omit({ createdAt: true });

export type FinancialDocument = typeof financialDocuments.$inferSelect;
export type InsertFinancialDocument = z.infer<typeof insertFinancialDocumentSchema>;

// ---------------------------------------------------------------------------
// Progress snapshots (JSON files, additive fields only)
// ---------------------------------------------------------------------------

export const universityCoverageSchema = z.object({
  years: z.array(z.number().int()),
  minYear: z.number().int().nullable(),
  maxYear: z.number().int().nullable(),
  fileCount: z.number().int().nonnegative(),
  unknownYearFiles: z.number().int().nonnegative().default(0),
});

export const missingYearsSchema = z.array(z.number().int());

export const progressSnapshotSchema = z.object({
  version: z.number().int().positive().default(1),
  timestamp: z.string().datetime(),
  iteration: z.number().int().nonnegative(),
  referenceYear: z.number().int(),
  window: z.object({
    start: z.number().int(),
    end: z.number().int(),
  }),
  universities: z.record(z.string(), universityCoverageSchema),
  missing: z.record(z.string(), missingYearsSchema),
  unstarted: z.array(z.string()).default([]),
  plannedTasks: z.number().int().nonnegative().default(0),
  acquiredDocuments: z.number().int().nonnegative().default(0),
});

/** Loose outer shape: per-university entries are validated one by one. */
export const progressSnapshotEnvelopeSchema = progressSnapshotSchema.extend({
  universities: z.record(z.string(), z.unknown()),
  missing: z.record(z.string(), z.unknown()),
});

export type UniversityCoverage = z.infer<typeof universityCoverageSchema>;
export type ProgressSnapshot = z.infer<typeof progressSnapshotSchema>;
