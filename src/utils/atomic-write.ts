import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { StorageIOError } from "../errors.ts";

/**
 * Stage-then-replace write: the content goes to a temp file in the target's
 * directory, then a rename swaps it in. A failed write leaves the previous
 * file untouched and removes the temp file.
 */
export async function writeFileAtomic(path: string, contents: string): Promise<void> {
  const suffix = `${Date.now()}-${Math.random().toString(16).slice(2)}`;
  const tmpPath = `${path}.tmp-${suffix}`;

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmpPath, contents, "utf8");
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true }).catch(() => undefined);
    throw new StorageIOError(path, `Could not write ${path}`, error);
  }
}
