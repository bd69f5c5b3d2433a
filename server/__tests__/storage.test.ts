import { describe, it, expect, vi } from "vitest";
import { DatabaseStorage, MemoryStorage, summarizeRecords } from "../storage";
import { MalformedRecordError, RecordStoreUnavailableError } from "../collection/errors";
import { runMigrations } from "../migrate";

const acquiredAt = new Date("2024-05-01T10:00:00.000Z");

describe("MemoryStorage", () => {
  it("lists records by university, then year, placeholders with no year last", async () => {
    const store = new MemoryStorage([
      { university: "University of Oxford", year: 2022, documentPath: "ox22.pdf" },
      { university: "University of Bath", year: null, yearLabel: "n/a", documentPath: "bath.pdf" },
      { university: "University of Bath", year: 2021, documentPath: "bath21.pdf" },
    ]);
    const rows = await store.listRecords();
    expect(rows.map((r) => [r.university, r.year])).toEqual([
      ["University of Bath", 2021],
      ["University of Bath", null],
      ["University of Oxford", 2022],
    ]);
  });

  it("adds placeholders only where no row exists", async () => {
    const store = new MemoryStorage([{ university: "University of Bath", year: 2021, documentPath: "bath21.pdf" }]);
    const added = await store.ensurePlaceholders([
      { university: "University of Bath", year: 2021, yearLabel: "2020-21" },
      { university: "University of Bath", year: 2022, yearLabel: "2021-22" },
      { university: "University of Bath", year: 2022, yearLabel: "2021-22" },
    ]);
    expect(added).toBe(1);
    expect(await store.getStats()).toEqual({ records: 2, documents: 1, placeholders: 1, universities: 1 });
  });

  it("fills a placeholder when the document arrives", async () => {
    const store = new MemoryStorage();
    await store.ensurePlaceholders([{ university: "University of Bath", year: 2022, yearLabel: "2021-22" }]);
    const { record: row, written } = await store.recordAcquisition({
      university: "University of Bath",
      year: 2022,
      yearLabel: "2021-22",
      sourceUrl: "https://www.bath.ac.uk/fs-2022.pdf",
      documentPath: "downloads/University_of_Bath/fs-2022.pdf",
      acquiredAt,
    });
    expect(written).toBe(true);
    expect(row).toMatchObject({ id: 1, documentPath: "downloads/University_of_Bath/fs-2022.pdf", acquiredAt });
    expect(await store.getStats()).toEqual({ records: 1, documents: 1, placeholders: 0, universities: 1 });
  });

  const yearless = {
    university: "University of Bath",
    year: null,
    yearLabel: null,
    sourceUrl: "https://www.bath.ac.uk/report.pdf",
    documentPath: "report.pdf",
    acquiredAt,
  };

  it("inserts a new row for each distinct document without a year", async () => {
    const store = new MemoryStorage();
    await store.recordAcquisition(yearless);
    await store.recordAcquisition({ ...yearless, sourceUrl: "https://www.bath.ac.uk/report-2.pdf", documentPath: "report-2.pdf" });
    expect((await store.listRecords()).map((r) => [r.id, r.documentPath])).toEqual([
      [1, "report.pdf"],
      [2, "report-2.pdf"],
    ]);
  });

  it("writes nothing when the same yearless document is recorded again", async () => {
    const store = new MemoryStorage();
    expect((await store.recordAcquisition(yearless)).written).toBe(true);
    const again = await store.recordAcquisition(yearless);
    expect(again).toMatchObject({ written: false, record: { id: 1, documentPath: "report.pdf" } });
    expect(await store.getStats()).toEqual({ records: 1, documents: 1, placeholders: 0, universities: 1 });
  });

  it("updates a yearless row when the same URL is saved under a new path", async () => {
    const store = new MemoryStorage();
    await store.recordAcquisition(yearless);
    const moved = await store.recordAcquisition({ ...yearless, documentPath: "renamed/report.pdf" });
    expect(moved).toMatchObject({ written: true, record: { id: 1, documentPath: "renamed/report.pdf" } });
    expect((await store.listRecords()).map((r) => r.documentPath)).toEqual(["renamed/report.pdf"]);
  });

  it("rejects an acquisition that fails row validation", async () => {
    const store = new MemoryStorage();
    await expect(
      store.recordAcquisition({
        university: "University of Bath",
        year: 2022.5,
        yearLabel: null,
        sourceUrl: "https://www.bath.ac.uk/x.pdf",
        documentPath: "x.pdf",
        acquiredAt,
      }),
    ).rejects.toBeInstanceOf(MalformedRecordError);
  });

  it("attaches extraction output to an existing row", async () => {
    const store = new MemoryStorage([{ university: "University of Bath", year: 2022, documentPath: "b.pdf" }]);
    const updated = await store.attachExtraction(1, { textPath: "b.txt", structuredPath: null, pageCount: 40 });
    expect(updated).toMatchObject({ textPath: "b.txt", pageCount: 40 });
    expect(await store.attachExtraction(99, { textPath: "x.txt", structuredPath: null, pageCount: null })).toBeUndefined();
  });

  it("returns copies so callers cannot change stored rows", async () => {
    const store = new MemoryStorage([{ university: "University of Bath", year: 2022, documentPath: "b.pdf" }]);
    const [row] = await store.listRecords();
    row.documentPath = null;
    expect((await store.listRecords())[0].documentPath).toBe("b.pdf");
  });
});

describe("summarizeRecords", () => {
  it("returns zeros for an empty store", () => {
    expect(summarizeRecords([])).toEqual({ records: 0, documents: 0, placeholders: 0, universities: 0 });
  });
});

describe("DatabaseStorage", () => {
  it("reports the store as unavailable without a database", async () => {
    const store = new DatabaseStorage();
    await expect(store.listRecords()).rejects.toBeInstanceOf(RecordStoreUnavailableError);
    await expect(store.getStats()).rejects.toThrow("DATABASE_URL is not set");
  });
});

describe("runMigrations", () => {
  it("applies every statement and counts the ones that succeed", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const query = vi
      .fn()
      .mockResolvedValueOnce({})
      .mockRejectedValueOnce(new Error("permission denied"))
      .mockResolvedValueOnce({});

    expect(await runMigrations({ query })).toBe(2);
    expect(query).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("permission denied"));
    warn.mockRestore();
  });
});
