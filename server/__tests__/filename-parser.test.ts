import { describe, it, expect } from "vitest";
import * as path from "path";
import { fileURLToPath } from "url";
import { guessUniversityName, parseDocumentFilename } from "../collection/filename-parser";
import { UNKNOWN_YEAR } from "../collection/financial-year";
import { IdentityResolver, loadReferenceTable } from "../collection/identity";
import { testResolver } from "./fixtures";

const resolver = testResolver();
const DATA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../data");

describe("parseDocumentFilename", () => {
  it("parses university and ending year from an annual report name", () => {
    const parsed = parseDocumentFilename("Anglia_Ruskin_University_annual-report-2022-23.txt", resolver);
    expect(parsed.kind).toBe("parsed");
    if (parsed.kind !== "parsed") return;
    expect(parsed.match.university.canonicalName).toBe("Anglia Ruskin University");
    expect(parsed.match.matchedBy).toBe("exact");
    expect(parsed.year).toBe(2023);
  });

  it("stops the name at the first year part", () => {
    const parsed = parseDocumentFilename("University_of_Cambridge_2019_financial_statements.pdf", resolver);
    expect(parsed).toMatchObject({ kind: "parsed", year: 2019 });
    if (parsed.kind === "parsed") {
      expect(parsed.match.university.canonicalName).toBe("University of Cambridge");
    }
  });

  it("records a yearless file under the university with an unknown year", () => {
    const parsed = parseDocumentFilename("University_of_Bath_accounts.txt", resolver);
    expect(parsed).toMatchObject({ kind: "parsed", year: UNKNOWN_YEAR });
  });

  it("reports several distinct years as ambiguous", () => {
    const parsed = parseDocumentFilename("University_of_Oxford_2019_2021_report.txt", resolver);
    expect(parsed.kind).toBe("ambiguous-year");
    if (parsed.kind !== "ambiguous-year") return;
    expect(parsed.match.university.canonicalName).toBe("University of Oxford");
    expect(parsed.candidateYears).toEqual([2019, 2021]);
  });

  it("falls back to hyphen-separated names", () => {
    const parsed = parseDocumentFilename("anglia-ruskin-university-2021-22-accounts.pdf", resolver);
    expect(parsed.kind).toBe("parsed");
    if (parsed.kind !== "parsed") return;
    expect(parsed.match.university.canonicalName).toBe("Anglia Ruskin University");
    expect(parsed.match.matchedBy).toBe("normalized");
    expect(parsed.year).toBe(2022);
  });

  it("reads only the basename of a path", () => {
    const parsed = parseDocumentFilename("extracted_text/bath/University_of_Bath_2020-21_fs.txt", resolver);
    expect(parsed).toMatchObject({
      kind: "parsed",
      filename: "extracted_text/bath/University_of_Bath_2020-21_fs.txt",
      year: 2021,
    });
  });

  it("is unparseable when no prefix names a known university", () => {
    const parsed = parseDocumentFilename("Ruskin_College_Oxford_annual_report_2020.txt", resolver);
    expect(parsed).toEqual({
      kind: "unparseable",
      filename: "Ruskin_College_Oxford_annual_report_2020.txt",
      rawName: "Ruskin College Oxford",
    });
  });
});

describe("guessUniversityName", () => {
  it("stops at a year or a document keyword", () => {
    expect(guessUniversityName("Some_Institute_2020_report")).toBe("Some Institute");
    expect(guessUniversityName("Some_Institute_Financial_Statements")).toBe("Some Institute");
  });

  it("falls back to the whole stem", () => {
    expect(guessUniversityName("2020_report")).toBe("2020_report");
  });
});

describe("parseDocumentFilename with the bundled reference table", () => {
  const table = loadReferenceTable(DATA_DIR);
  const bundled = new IdentityResolver(table);

  it("resolves the sanitised filename of every university", () => {
    const failures = table.universities.flatMap((university) => {
      const filename = `${university.canonicalName.replace(/[^A-Za-z0-9]+/g, "_")}_2022-23_financial_statements.txt`;
      const parsed = parseDocumentFilename(filename, bundled);
      const resolved =
        parsed.kind === "parsed" &&
        parsed.match.university.canonicalName === university.canonicalName &&
        parsed.year === 2023;
      return resolved ? [] : [filename];
    });
    expect(failures).toEqual([]);
  });

  it("joins the possessive s split off by an apostrophe", () => {
    const parsed = parseDocumentFilename("Queen_s_University_Belfast_2021_accounts.pdf", bundled);
    expect(parsed).toMatchObject({ kind: "parsed", year: 2021 });
    if (parsed.kind === "parsed") {
      expect(parsed.match.university.canonicalName).toBe("Queen’s University Belfast");
      expect(parsed.match.matchedBy).toBe("normalized");
    }
  });
});
