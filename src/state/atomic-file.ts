import { randomUUID } from "node:crypto";
import { mkdir, readFile, readdir, rename, unlink, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

/** Checks the shape, not the prototype: errors from Node's own modules may come from another realm. */
export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  typeof error === "object" && error !== null && "code" in error && typeof error.code === "string";

export const hasErrorCode = ({ error, code }: { error: unknown; code: string }): boolean =>
  isErrnoException(error) && error.code === code;

/**
 * Writes JSON next to the target then renames it into place, so readers see either the
 * previous record or the new one and never a partial file.
 */
export const writeJsonAtomic = async ({
  path,
  value,
}: {
  path: string;
  value: unknown;
}): Promise<void> => {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });
  const tmpPath = join(dir, `.${randomUUID()}.tmp`);
  await writeFile(tmpPath, JSON.stringify(value, null, 2), "utf-8");
  try {
    await rename(tmpPath, path);
  } catch (error) {
    await removeFile({ path: tmpPath });
    throw error;
  }
};

/** Exclusive create. Returns false when the file already exists. */
export const createJsonExclusive = async ({
  path,
  value,
}: {
  path: string;
  value: unknown;
}): Promise<boolean> => {
  await mkdir(dirname(path), { recursive: true });
  try {
    await writeFile(path, JSON.stringify(value, null, 2), { encoding: "utf-8", flag: "wx" });
    return true;
  } catch (error) {
    if (hasErrorCode({ error, code: "EEXIST" })) {
      return false;
    }
    throw error;
  }
};

/** Returns false when the file was already gone. */
export const removeFile = async ({ path }: { path: string }): Promise<boolean> => {
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if (hasErrorCode({ error, code: "ENOENT" })) {
      return false;
    }
    throw error;
  }
};

export const readJsonFile = async ({ path }: { path: string }): Promise<unknown> => {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    if (hasErrorCode({ error, code: "ENOENT" })) {
      return null;
    }
    throw error;
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    // half-written or foreign file; callers treat it as absent
    return null;
  }
};

export const listJsonFiles = async ({ dir }: { dir: string }): Promise<string[]> => {
  try {
    const files = await readdir(dir);
    return files.filter((file) => file.endsWith(".json") && !file.startsWith(".")).sort();
  } catch (error) {
    if (hasErrorCode({ error, code: "ENOENT" })) {
      return [];
    }
    throw error;
  }
};

export const listDirs = async ({ dir }: { dir: string }): Promise<string[]> => {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (hasErrorCode({ error, code: "ENOENT" })) {
      return [];
    }
    throw error;
  }
};
