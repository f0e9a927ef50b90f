import { randomBytes } from "node:crypto";
import { mkdir, open, readFile, rename, rm, stat } from "node:fs/promises";
import path from "node:path";
import { AssetNotFoundError, isErrnoException } from "./errors";

/** `mkdir -p`; safe to call concurrently for the same directory. */
export async function ensureDirectory(directoryPath: string): Promise<void> {
  await mkdir(directoryPath, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (isErrnoException(error, "ENOENT")) {
      return false;
    }
    throw error;
  }
}

/**
 * Writes to a temporary sibling, flushes it to disk and renames it over
 * `filePath`, so readers never observe a partially written file.
 */
export async function writeFileDurable(filePath: string, contents: Uint8Array): Promise<void> {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`
  );
  const handle = await open(tempPath, "w");
  try {
    await handle.writeFile(contents);
    await handle.sync();
  } catch (error) {
    await handle.close();
    await rm(tempPath, { force: true });
    throw error;
  }
  await handle.close();
  try {
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export async function removeFileIfExists(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/** Reads an input asset, mapping a missing file to `AssetNotFoundError`. */
export async function readAsset(assetPath: string, kind = "asset"): Promise<Buffer> {
  try {
    return await readFile(assetPath);
  } catch (error) {
    if (isErrnoException(error, "ENOENT") || isErrnoException(error, "EISDIR")) {
      throw new AssetNotFoundError(assetPath, kind);
    }
    throw error;
  }
}
