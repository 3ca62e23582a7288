import { promises as fs } from "node:fs";
import path from "node:path";
import { CorruptLocalStateError, errorMessage } from "./errors";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Reads and parses a JSON file. Returns null when the file does not exist and
 * throws CorruptLocalStateError when it exists but cannot be read or parsed.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }

    throw new CorruptLocalStateError(filePath, `Failed to read ${filePath}: ${errorMessage(error)}`, {
      cause: error
    });
  }

  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new CorruptLocalStateError(filePath, `Failed to parse ${filePath}: ${errorMessage(error)}`, {
      cause: error
    });
  }
}

/** Writes JSON next to the target and renames it into place. */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new CorruptLocalStateError(filePath, `Failed to write ${filePath}: ${errorMessage(error)}`, {
      cause: error
    });
  }
}

export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.rm(filePath, { force: true });
  } catch (error) {
    throw new CorruptLocalStateError(filePath, `Failed to remove ${filePath}: ${errorMessage(error)}`, {
      cause: error
    });
  }
}
