import { stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ArtifactExistsError } from "../src/lib/errors";
import { allocateOutputPath, formatArtifactName } from "../src/lib/outputPaths";
import { makeTempDir, removeTempDir } from "./helpers";

describe("outputPaths", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("names artifacts after row index and display name", () => {
    expect(formatArtifactName(1, "Ali", "png")).toBe("1-Ali.png");
    expect(formatArtifactName(12, "Sara Lee", ".pdf")).toBe("12-Sara Lee.pdf");
  });

  it("replaces path separators in names", () => {
    expect(formatArtifactName(3, "R&D/Ops\\West", "png")).toBe("3-R&D_Ops_West.png");
  });

  it("creates missing directories", async () => {
    const baseDir = path.join(dir, "a", "b");
    const target = await allocateOutputPath(baseDir, 7, "Sara", "png");

    expect(target).toBe(path.join(baseDir, "7-Sara.png"));
    expect((await stat(baseDir)).isDirectory()).toBe(true);
  });

  it("can be called again for an existing directory", async () => {
    await allocateOutputPath(dir, 1, "Ali", "png");
    await expect(allocateOutputPath(dir, 2, "Ali", "png")).resolves.toBe(path.join(dir, "2-Ali.png"));
  });

  it("copes with concurrent calls creating the same directory", async () => {
    const baseDir = path.join(dir, "shared");
    const targets = await Promise.all(
      Array.from({ length: 10 }, (_, i) => allocateOutputPath(baseDir, i + 1, "Name", "png"))
    );
    expect(new Set(targets).size).toBe(10);
  });

  it("returns the path of an existing file by default", async () => {
    const existing = path.join(dir, "1-Ali.png");
    await writeFile(existing, "old");
    await expect(allocateOutputPath(dir, 1, "Ali", "png")).resolves.toBe(existing);
  });

  it("refuses an existing file under the fail policy", async () => {
    await writeFile(path.join(dir, "1-Ali.png"), "old");
    await expect(allocateOutputPath(dir, 1, "Ali", "png", { onExisting: "fail" })).rejects.toThrow(
      ArtifactExistsError
    );
    await expect(allocateOutputPath(dir, 2, "Ali", "png", { onExisting: "fail" })).resolves.toBe(
      path.join(dir, "2-Ali.png")
    );
  });
});
