import fs from "fs";
import path from "path";
import { FileSystemError, MalformedRecordError } from "../errors";

function assertReadableDirectory(root: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(root);
    fs.accessSync(root, fs.constants.R_OK);
  } catch (err) {
    throw new FileSystemError(root, `Cannot read data directory: ${root}`, err);
  }
  if (!stats.isDirectory()) {
    throw new FileSystemError(root, `Not a directory: ${root}`);
  }
}

/**
 * Walks `root` recursively and yields the absolute path of every file ending
 * in `extension`, in directory traversal order.
 */
export function* getFiles(
  root: string,
  extension = ".json"
): Generator<string> {
  assertReadableDirectory(root);

  const pending = [path.resolve(root)];
  while (pending.length > 0) {
    const dir = pending.shift();
    if (dir === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      throw new FileSystemError(dir, `Cannot read directory: ${dir}`, err);
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(fullPath);
      } else if (entry.isFile() && entry.name.endsWith(extension)) {
        yield fullPath;
      }
    }
  }
}

export function listFiles(root: string, extension = ".json"): string[] {
  return Array.from(getFiles(root, extension));
}

function parseDocument(filePath: string, text: string): unknown[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new MalformedRecordError(
      filePath,
      `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return Array.isArray(parsed) ? parsed : [parsed];
}

export interface ReadJsonRecordsOptions {
  /**
   * Receives each line of a line-delimited file that is not valid JSON; the
   * line is then left out. Without it the first such line throws.
   */
  onMalformedLine?: (err: MalformedRecordError) => void;
}

/**
 * Reads the records of one data file. Accepts a JSON array, a single JSON
 * object (pretty-printed or not), or one JSON object per line.
 */
export function readJsonRecords(
  filePath: string,
  options: ReadJsonRecordsOptions = {}
): unknown[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new FileSystemError(filePath, `Cannot read file: ${filePath}`, err);
  }

  const trimmed = content.trim();
  if (trimmed === "") return [];
  if (trimmed.startsWith("[")) return parseDocument(filePath, trimmed);

  const records: unknown[] = [];
  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === "") continue;
    try {
      records.push(JSON.parse(line));
    } catch (err) {
      // A first line that is not a full document means one multi-line object.
      if (records.length === 0) return parseDocument(filePath, trimmed);
      const malformed = new MalformedRecordError(
        filePath,
        `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
        i + 1
      );
      if (!options.onMalformedLine) throw malformed;
      options.onMalformedLine(malformed);
    }
  }
  return records;
}
