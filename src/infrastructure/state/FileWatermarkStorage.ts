import { promises as fs } from "fs";
import path from "path";
import type { WatermarkStorage } from "../../ports/WatermarkStorage";
import { PersistenceError } from "../../shared/errors/errors";

type StateFile = {
  last_loaded_date: string;
  updated_at: string;
};

const isMissingFile = (err: unknown): boolean =>
  err instanceof Error && "code" in err && err.code === "ENOENT";

const parseStateFile = (filePath: string, content: string): StateFile => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new PersistenceError({ operation: "read", message: `State file ${filePath} is not valid JSON`, cause: err });
  }

  if (typeof parsed !== "object" || parsed === null) {
    throw new PersistenceError({ operation: "read", message: `State file ${filePath} is not a JSON object` });
  }

  if (!("last_loaded_date" in parsed) || typeof parsed.last_loaded_date !== "string") {
    throw new PersistenceError({ operation: "read", message: `State file ${filePath} has no last_loaded_date` });
  }

  return {
    last_loaded_date: parsed.last_loaded_date,
    updated_at: "updated_at" in parsed && typeof parsed.updated_at === "string" ? parsed.updated_at : ""
  };
};

/**
 * Keeps the watermark in a small JSON file. Writes go to a sibling temp file
 * that is flushed and closed before being renamed over the target.
 */
export class FileWatermarkStorage implements WatermarkStorage {
  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async read(): Promise<string | undefined> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      throw err;
    }
    return parseStateFile(this.filePath, content).last_loaded_date;
  }

  async write(value: string): Promise<void> {
    const state: StateFile = { last_loaded_date: value, updated_at: this.now().toISOString() };
    const dir = path.dirname(this.filePath);
    const tmpPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.tmp`);

    await fs.mkdir(dir, { recursive: true });

    let tmpCreated = false;
    let committed = false;
    try {
      const handle = await fs.open(tmpPath, "w");
      tmpCreated = true;
      try {
        await handle.writeFile(`${JSON.stringify(state, null, 2)}\n`, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }

      await fs.rename(tmpPath, this.filePath);
      committed = true;
    } finally {
      if (tmpCreated && !committed) await fs.rm(tmpPath, { force: true });
    }
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}
