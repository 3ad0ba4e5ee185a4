import * as fs from "fs";

/**
 * Get/put-by-path storage for JSON-serialisable values.
 * `read` returns null for a missing entry and throws on any other failure.
 */
export interface BlobStore {
  read(filePath: string): unknown;
  write(filePath: string, value: unknown): void;
  ensureDir(dirPath: string): void;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Stores each value as a pretty-printed JSON file. */
export class JsonFileBlobStore implements BlobStore {
  read(filePath: string): unknown {
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    return JSON.parse(raw);
  }

  write(filePath: string, value: unknown): void {
    fs.writeFileSync(filePath, JSON.stringify(value, null, 2) + "\n", "utf-8");
  }

  ensureDir(dirPath: string): void {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}
