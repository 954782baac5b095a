import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { logError, logWarn } from "./core/logger";

/**
 * Read a JSON object of records from disk.
 * A missing file is an empty map, and so is unparseable JSON or a document
 * that is not an object (logged). Entries that do not match `schema` are
 * dropped one by one and logged; the rest load.
 */
export function loadJsonMap<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Record<string, T> {
  if (!fs.existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    logError(`Error loading ${filePath}, starting with an empty map`, err, { filePath });
    return {};
  }

  const entries = z.record(z.unknown()).safeParse(raw);
  if (!entries.success) {
    logError(`Unexpected content in ${filePath}, starting with an empty map`, undefined, { filePath });
    return {};
  }

  const map: Record<string, T> = {};
  const dropped: string[] = [];
  for (const [key, value] of Object.entries(entries.data)) {
    const parsed = schema.safeParse(value);
    if (parsed.success) map[key] = parsed.data;
    else dropped.push(key);
  }
  if (dropped.length > 0) {
    logWarn(`Dropped ${dropped.length} malformed entries from ${filePath}`, {
      filePath,
      keys: dropped.slice(0, 20),
    });
  }
  return map;
}

/**
 * Write a map as pretty-printed JSON, replacing the whole file.
 * The content goes to a sibling temp file first and is renamed into place,
 * so a crash mid-write leaves the previous version intact.
 */
export async function saveJsonMap(filePath: string, map: Record<string, unknown>): Promise<void> {
  await writeSnapshot(filePath, JSON.stringify(map, null, 2));
}

async function writeSnapshot(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true });
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
  await fs.promises.writeFile(tmpPath, content + "\n", "utf-8");
  await fs.promises.rename(tmpPath, filePath);
}

/**
 * One JSON file of records. Every `save` rewrites the file; writes are
 * queued so concurrent callers cannot interleave rewrites, and the file
 * always ends up holding the most recent snapshot.
 */
export class JsonMapStore<T> {
  private pending: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  load(): Record<string, T> {
    return loadJsonMap(this.filePath, this.schema);
  }

  /** Snapshot `map` now and write it after any earlier writes finish. */
  save(map: Record<string, T>): Promise<void> {
    const content = JSON.stringify(map, null, 2);
    const write = this.pending.then(() => writeSnapshot(this.filePath, content));
    // A failed write must not block the ones queued after it.
    this.pending = write.catch(() => undefined);
    return write;
  }

  /** Wait for every queued write. */
  flush(): Promise<void> {
    return this.pending;
  }
}
