import * as fs from "fs";
import * as path from "path";
import { logWarning } from "../log";

/**
 * Every file under `dir` with one of `extensions`, as paths relative to `dir`
 * in sorted order. A missing directory yields an empty list.
 */
export function walkFiles(dir: string, extensions: ReadonlySet<string>): string[] {
  const out: string[] = [];
  if (!fs.existsSync(dir)) return out;

  const stack: string[] = [dir];
  while (stack.length > 0) {
    const cur = stack.pop();
    if (cur === undefined) break;
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(cur, { withFileTypes: true });
    } catch (err) {
      logWarning(`Skipping unreadable directory ${cur}: ${err instanceof Error ? err.message : String(err)}`, "inventory");
      continue;
    }
    for (const e of entries) {
      const full = path.join(cur, e.name);
      if (e.isDirectory()) {
        stack.push(full);
      } else if (e.isFile() && extensions.has(path.extname(e.name).toLowerCase())) {
        out.push(path.relative(dir, full));
      }
    }
  }

  return out.sort();
}

/** Extracted text documents, the filename half of the inventory input. */
export function scanExtractedText(dir: string): string[] {
  return walkFiles(dir, new Set([".txt"]));
}
