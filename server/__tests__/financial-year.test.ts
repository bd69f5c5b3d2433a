import { describe, it, expect } from "vitest";
import {
  extractYearCandidates,
  formatFinancialYear,
  isPlausibleYear,
  parseFinancialYear,
} from "../collection/financial-year";

describe("formatFinancialYear", () => {
  it("renders the ending year as a YYYY-YY range", () => {
    expect(formatFinancialYear(2024)).toBe("2023-24");
    expect(formatFinancialYear(2000)).toBe("1999-00");
    expect(formatFinancialYear(2010)).toBe("2009-10");
  });
});

describe("isPlausibleYear", () => {
  it("accepts whole years from 1990 to 2100", () => {
    expect(isPlausibleYear(1990)).toBe(true);
    expect(isPlausibleYear(2100)).toBe(true);
    expect(isPlausibleYear(1989)).toBe(false);
    expect(isPlausibleYear(2101)).toBe(false);
    expect(isPlausibleYear(2020.5)).toBe(false);
  });
});

describe("extractYearCandidates", () => {
  it("normalizes academic-year ranges to the ending year", () => {
    expect(extractYearCandidates("annual-report-2022-23")).toEqual([2023]);
    expect(extractYearCandidates("accounts 2022-2023")).toEqual([2023]);
    expect(extractYearCandidates("fs_2022_23")).toEqual([2023]);
    expect(extractYearCandidates("statements 2022/23")).toEqual([2023]);
  });

  it("reads compact forms after a document word", () => {
    expect(extractYearCandidates("accounts1920")).toEqual([2020]);
    expect(extractYearCandidates("statements_2122")).toEqual([2022]);
    expect(extractYearCandidates("fs9900")).toEqual([2000]);
  });

  it("takes a lone four-digit year as the ending year", () => {
    expect(extractYearCandidates("report 2023")).toEqual([2023]);
  });

  it("does not read a calendar date as a financial-year range", () => {
    expect(extractYearCandidates("2023-10-05 board minutes")).toEqual([2023]);
  });

  it("ignores years outside the supported range", () => {
    expect(extractYearCandidates("founded 1850, report 2023")).toEqual([2023]);
    expect(extractYearCandidates("ref 123456")).toEqual([]);
  });

  it("returns every distinct year, ascending", () => {
    expect(extractYearCandidates("2021 and 2019 and 2021")).toEqual([2019, 2021]);
  });
});

describe("parseFinancialYear", () => {
  it("parses a single-year label", () => {
    expect(parseFinancialYear("2023-24")).toBe(2024);
    expect(parseFinancialYear(" 2019 ")).toBe(2019);
  });

  it("returns null for empty, yearless or ambiguous labels", () => {
    expect(parseFinancialYear("")).toBeNull();
    expect(parseFinancialYear("n/a")).toBeNull();
    expect(parseFinancialYear("2019 to 2021")).toBeNull();
  });
});
