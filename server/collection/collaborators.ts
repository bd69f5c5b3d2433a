import type { SearchTask } from "./query-planner";

export interface FetchRequest {
  task: SearchTask;
  outputDir: string;
  /** Upper bound on documents saved for this query. */
  limit: number;
}

export interface FetchedDocument {
  localPath: string;
  sourceUrl: string;
  retrievedAt: Date;
}

/**
 * Runs one search and saves what it finds. Returns an empty list when nothing
 * matched; throws only when the transport itself failed. Either way the gap
 * stays open.
 */
export interface DocumentFetcher {
  fetch(request: FetchRequest): Promise<FetchedDocument[]>;
}

export interface ExtractedText {
  textPath: string;
  structuredPath: string | null;
  pageCount: number | null;
}

export type ExtractionResult =
  | ({ status: "extracted" } & ExtractedText)
  | ({ status: "already-processed" } & ExtractedText);

/** Idempotent: a second call for the same document reports "already-processed". */
export interface TextExtractor {
  extract(documentPath: string): Promise<ExtractionResult>;
}

/**
 * True when `sourceUrl` is served from `domain` or one of its subdomains.
 * A null domain accepts any UK academic host.
 */
export function isOwnedBy(sourceUrl: string, domain: string | null): boolean {
  let host: string;
  try {
    host = new URL(sourceUrl).hostname.toLowerCase();
  } catch {
    return false;
  }
  if (!domain) return host === "ac.uk" || host.endsWith(".ac.uk");
  const owner = domain.toLowerCase();
  return host === owner || host.endsWith(`.${owner}`);
}
