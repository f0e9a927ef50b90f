import path from "node:path";
import { ArtifactExistsError } from "./errors";
import { ensureDirectory, fileExists } from "./fileSystem";
import type { CollisionPolicy } from "./types";

// Separators would move the file out of its directory; NUL is rejected by the OS.
const UNSAFE_NAME_CHARS = /[/\\\0]/g;

export function formatArtifactName(rowIndex: number, displayName: string, extension: string): string {
  const ext = extension.replace(/^\./, "");
  return `${rowIndex}-${displayName.replace(UNSAFE_NAME_CHARS, "_")}.${ext}`;
}

/**
 * Returns `baseDir/{rowIndex}-{displayName}.{extension}` after making sure
 * `baseDir` exists. Existing files are overwritten unless `onExisting` is
 * `"fail"`.
 */
export async function allocateOutputPath(
  baseDir: string,
  rowIndex: number,
  displayName: string,
  extension: string,
  options: { onExisting?: CollisionPolicy } = {}
): Promise<string> {
  await ensureDirectory(baseDir);
  const target = path.join(baseDir, formatArtifactName(rowIndex, displayName, extension));
  if (options.onExisting === "fail" && (await fileExists(target))) {
    throw new ArtifactExistsError(target);
  }
  return target;
}
