import path from "node:path";
import JSZip from "jszip";
import { ensureDirectory, readAsset, writeFileDurable } from "./fileSystem";
import type { GeneratedArtifact } from "./types";

function entryName(filePath: string): string {
  return `${path.basename(path.dirname(filePath))}/${path.basename(filePath)}`;
}

/**
 * Bundles the QR images and PDFs of `artifacts` into one zip. Entries keep
 * their output directory name as prefix, e.g. `QR_codes/1-Ali.png`.
 */
export async function createArtifactArchive(
  artifacts: readonly GeneratedArtifact[],
  zipPath: string
): Promise<string> {
  const zip = new JSZip();
  for (const artifact of artifacts) {
    const files = artifact.pdfPath ? [artifact.qrImagePath, artifact.pdfPath] : [artifact.qrImagePath];
    for (const file of files) {
      zip.file(entryName(file), await readAsset(file, "artifact"));
    }
  }
  const content = await zip.generateAsync({ type: "uint8array", compression: "DEFLATE" });
  await ensureDirectory(path.dirname(zipPath));
  await writeFileDurable(zipPath, content);
  return zipPath;
}
