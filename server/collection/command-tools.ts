/**
 * Command Collaborators
 *
 * Bridges to the external fetch and extract tools. Each tool is spawned as a
 * child process and prints a single JSON document on stdout:
 *
 *   fetcher   --query <q> --output <dir> --limit <n> [--domain <d>]
 *             → [{ "localPath", "sourceUrl", "retrievedAt"? }]
 *   extractor <documentPath>
 *             → { "status", "textPath", "structuredPath"?, "pageCount"? }
 */

import { execFile } from "child_process";
import { z } from "zod";
import type {
  DocumentFetcher,
  ExtractionResult,
  FetchedDocument,
  FetchRequest,
  TextExtractor,
} from "./collaborators";
import { InvalidConfigError } from "./errors";

export const FETCH_TIMEOUT_MS = 5 * 60 * 1000;
export const EXTRACT_TIMEOUT_MS = 60 * 60 * 1000;

export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<string>;

export const execFileRunner: CommandRunner = (file, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { timeout: timeoutMs, maxBuffer: 10 * 1024 * 1024, encoding: "utf-8" },
      (error, stdout, stderr) => {
        if (error) {
          const detail = stderr.trim() ? `: ${stderr.trim().split("\n").slice(-1)[0]}` : "";
          reject(new Error(`${file} failed (${error.message})${detail}`, { cause: error }));
          return;
        }
        resolve(stdout);
      },
    );
  });

const fetchedDocumentSchema = z.object({
  localPath: z.string().min(1),
  sourceUrl: z.string().url(),
  retrievedAt: z.coerce.date().optional(),
});

const fetchOutputSchema = z.array(fetchedDocumentSchema);

const extractOutputSchema = z.object({
  status: z.enum(["extracted", "already-processed"]),
  textPath: z.string().min(1),
  structuredPath: z.string().nullable().default(null),
  pageCount: z.number().int().nonnegative().nullable().default(null),
});

function splitCommand(command: string): { file: string; args: string[] } {
  const [file, ...args] = command.trim().split(/\s+/).filter(Boolean);
  if (!file) throw new InvalidConfigError("Collaborator command is empty");
  return { file, args };
}

function parseJsonOutput<T>(tool: string, stdout: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (err) {
    throw new Error(`${tool} printed invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`${tool} output rejected: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
  }
  return parsed.data;
}

export class CommandDocumentFetcher implements DocumentFetcher {
  private readonly file: string;
  private readonly baseArgs: string[];

  constructor(
    command: string,
    private readonly runner: CommandRunner = execFileRunner,
    private readonly now: () => Date = () => new Date(),
  ) {
    const { file, args } = splitCommand(command);
    this.file = file;
    this.baseArgs = args;
  }

  async fetch(request: FetchRequest): Promise<FetchedDocument[]> {
    const args = [
      ...this.baseArgs,
      "--query",
      request.task.query,
      "--output",
      request.outputDir,
      "--limit",
      String(request.limit),
    ];
    if (request.task.domain) args.push("--domain", request.task.domain);

    const stdout = await this.runner(this.file, args, FETCH_TIMEOUT_MS);
    if (!stdout.trim()) return [];

    return parseJsonOutput("fetcher", stdout, fetchOutputSchema).map((doc) => ({
      localPath: doc.localPath,
      sourceUrl: doc.sourceUrl,
      retrievedAt: doc.retrievedAt ?? this.now(),
    }));
  }
}

export class CommandTextExtractor implements TextExtractor {
  private readonly file: string;
  private readonly baseArgs: string[];

  constructor(command: string, private readonly runner: CommandRunner = execFileRunner) {
    const { file, args } = splitCommand(command);
    this.file = file;
    this.baseArgs = args;
  }

  async extract(documentPath: string): Promise<ExtractionResult> {
    const stdout = await this.runner(this.file, [...this.baseArgs, documentPath], EXTRACT_TIMEOUT_MS);
    return parseJsonOutput("extractor", stdout, extractOutputSchema);
  }
}
