import {
  financialDocuments,
  insertFinancialDocumentSchema,
  type FinancialDocument,
  type InsertFinancialDocument,
} from "@shared/schema";
import { db } from "./db";
import { and, asc, eq, isNull, or } from "drizzle-orm";
import { errorMessage, MalformedRecordError, RecordStoreUnavailableError } from "./collection/errors";
import { log } from "./log";

export interface PlaceholderInput {
  university: string;
  year: number;
  yearLabel: string;
}

export interface AcquisitionInput {
  university: string;
  year: number | null;
  yearLabel: string | null;
  sourceUrl: string;
  documentPath: string;
  acquiredAt: Date;
}

export interface AcquisitionResult {
  record: FinancialDocument;
  /** False when the same document was already recorded and nothing was written. */
  written: boolean;
}

export interface ExtractionInput {
  textPath: string;
  structuredPath: string | null;
  pageCount: number | null;
}

export interface RecordStoreStats {
  records: number;
  documents: number;
  placeholders: number;
  universities: number;
}

/**
 * The record store is the only source of truth for what has been collected.
 * Rows are keyed by (canonical university name, ending year); a row without a
 * documentPath is a placeholder for planned work.
 */
export interface IRecordStore {
  listRecords(): Promise<FinancialDocument[]>;
  /** Inserts a placeholder for each (university, year) with no row yet. Returns how many were added. */
  ensurePlaceholders(entries: readonly PlaceholderInput[]): Promise<number>;
  /**
   * Check-before-write. An existing row for the same (university, year) is
   * overwritten; a document without a year matches an earlier yearless row
   * with the same path or URL. Recording the same document twice writes nothing.
   */
  recordAcquisition(input: AcquisitionInput): Promise<AcquisitionResult>;
  attachExtraction(id: number, extraction: ExtractionInput): Promise<FinancialDocument | undefined>;
  getStats(): Promise<RecordStoreStats>;
}

export function summarizeRecords(rows: readonly FinancialDocument[]): RecordStoreStats {
  const documents = rows.filter((row) => row.documentPath);
  return {
    records: rows.length,
    documents: documents.length,
    placeholders: rows.length - documents.length,
    universities: new Set(documents.map((row) => row.university)).size,
  };
}

function validated(row: InsertFinancialDocument): InsertFinancialDocument {
  const parsed = insertFinancialDocumentSchema.safeParse(row);
  if (!parsed.success) {
    throw new MalformedRecordError(
      `record(${row.university}, ${row.year ?? "no year"})`,
      parsed.error.issues[0]?.message ?? "invalid row",
    );
  }
  return parsed.data;
}

function isSameDocument(row: FinancialDocument, input: AcquisitionInput): boolean {
  return row.documentPath === input.documentPath && row.sourceUrl === input.sourceUrl;
}

function database() {
  if (!db) throw new RecordStoreUnavailableError("DATABASE_URL is not set");
  return db;
}

async function unavailableOnFailure<T>(action: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof RecordStoreUnavailableError || err instanceof MalformedRecordError) throw err;
    throw new RecordStoreUnavailableError(`${action}: ${errorMessage(err)}`, err);
  }
}

export class DatabaseStorage implements IRecordStore {
  async listRecords(): Promise<FinancialDocument[]> {
    return unavailableOnFailure("list records", () =>
      database()
        .select()
        .from(financialDocuments)
        .orderBy(asc(financialDocuments.university), asc(financialDocuments.year), asc(financialDocuments.id)),
    );
  }

  private async find(university: string, year: number): Promise<FinancialDocument | undefined> {
    const [row] = await database()
      .select()
      .from(financialDocuments)
      .where(and(eq(financialDocuments.university, university), eq(financialDocuments.year, year)));
    return row;
  }

  private async findYearless(input: AcquisitionInput): Promise<FinancialDocument | undefined> {
    const [row] = await database()
      .select()
      .from(financialDocuments)
      .where(
        and(
          eq(financialDocuments.university, input.university),
          isNull(financialDocuments.year),
          or(eq(financialDocuments.documentPath, input.documentPath), eq(financialDocuments.sourceUrl, input.sourceUrl)),
        ),
      );
    return row;
  }

  async ensurePlaceholders(entries: readonly PlaceholderInput[]): Promise<number> {
    return unavailableOnFailure("record placeholders", async () => {
      let added = 0;
      for (const entry of entries) {
        if (await this.find(entry.university, entry.year)) continue;
        // a concurrent run may have inserted the row since the check
        const inserted = await database()
          .insert(financialDocuments)
          .values(validated({ university: entry.university, year: entry.year, yearLabel: entry.yearLabel }))
          .onConflictDoNothing()
          .returning({ id: financialDocuments.id });
        added += inserted.length;
      }
      return added;
    });
  }

  async recordAcquisition(input: AcquisitionInput): Promise<AcquisitionResult> {
    return unavailableOnFailure("record acquisition", async () => {
      const values = validated({ ...input });
      const existing =
        input.year === null ? await this.findYearless(input) : await this.find(input.university, input.year);
      if (existing && isSameDocument(existing, input)) return { record: existing, written: false };
      if (existing) {
        const [updated] = await database()
          .update(financialDocuments)
          .set(values)
          .where(eq(financialDocuments.id, existing.id))
          .returning();
        return { record: updated, written: true };
      }
      const [created] = await database().insert(financialDocuments).values(values).returning();
      return { record: created, written: true };
    });
  }

  async attachExtraction(id: number, extraction: ExtractionInput): Promise<FinancialDocument | undefined> {
    return unavailableOnFailure("attach extraction", async () => {
      const [updated] = await database()
        .update(financialDocuments)
        .set(extraction)
        .where(eq(financialDocuments.id, id))
        .returning();
      return updated;
    });
  }

  async getStats(): Promise<RecordStoreStats> {
    return summarizeRecords(await this.listRecords());
  }
}

/** Record store for tool-only mode and tests. Same semantics, no persistence. */
export class MemoryStorage implements IRecordStore {
  private rows: FinancialDocument[] = [];
  private nextId = 1;

  constructor(seed: readonly InsertFinancialDocument[] = []) {
    for (const row of seed) this.insert(validated(row));
  }

  private insert(values: InsertFinancialDocument): FinancialDocument {
    const row: FinancialDocument = {
      id: this.nextId++,
      university: values.university,
      year: values.year ?? null,
      yearLabel: values.yearLabel ?? null,
      sourceUrl: values.sourceUrl ?? null,
      documentPath: values.documentPath ?? null,
      textPath: values.textPath ?? null,
      structuredPath: values.structuredPath ?? null,
      pageCount: values.pageCount ?? null,
      acquiredAt: values.acquiredAt ?? null,
      createdAt: new Date(),
    };
    this.rows.push(row);
    return row;
  }

  private find(university: string, year: number): FinancialDocument | undefined {
    return this.rows.find((row) => row.university === university && row.year === year);
  }

  private findYearless(input: AcquisitionInput): FinancialDocument | undefined {
    return this.rows.find(
      (row) =>
        row.university === input.university &&
        row.year === null &&
        (row.documentPath === input.documentPath || row.sourceUrl === input.sourceUrl),
    );
  }

  async listRecords(): Promise<FinancialDocument[]> {
    return [...this.rows]
      .sort(
        (a, b) =>
          (a.university < b.university ? -1 : a.university > b.university ? 1 : 0) ||
          (a.year ?? Number.MAX_SAFE_INTEGER) - (b.year ?? Number.MAX_SAFE_INTEGER) ||
          a.id - b.id,
      )
      .map((row) => ({ ...row }));
  }

  async ensurePlaceholders(entries: readonly PlaceholderInput[]): Promise<number> {
    let added = 0;
    for (const entry of entries) {
      if (this.find(entry.university, entry.year)) continue;
      this.insert(validated({ university: entry.university, year: entry.year, yearLabel: entry.yearLabel }));
      added++;
    }
    return added;
  }

  async recordAcquisition(input: AcquisitionInput): Promise<AcquisitionResult> {
    const values = validated({ ...input });
    const existing = input.year === null ? this.findYearless(input) : this.find(input.university, input.year);
    if (!existing) return { record: { ...this.insert(values) }, written: true };
    if (isSameDocument(existing, input)) return { record: { ...existing }, written: false };
    Object.assign(existing, {
      yearLabel: input.yearLabel,
      sourceUrl: input.sourceUrl,
      documentPath: input.documentPath,
      acquiredAt: input.acquiredAt,
    });
    return { record: { ...existing }, written: true };
  }

  async attachExtraction(id: number, extraction: ExtractionInput): Promise<FinancialDocument | undefined> {
    const row = this.rows.find((r) => r.id === id);
    if (!row) return undefined;
    Object.assign(row, extraction);
    return { ...row };
  }

  async getStats(): Promise<RecordStoreStats> {
    return summarizeRecords(this.rows);
  }
}

export function createStorage(): IRecordStore {
  if (db) return new DatabaseStorage();
  log("No database configured; using the in-memory record store", "storage");
  return new MemoryStorage();
}
