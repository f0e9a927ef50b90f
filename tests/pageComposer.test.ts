import { readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_PAGE_CONFIG, resolvePageConfig, resolveQrConfig } from "../src/lib/config";
import {
  AssetNotFoundError,
  GlyphCoverageError,
  InvalidConfigError,
  UnknownFontError,
  UnsupportedImageError,
} from "../src/lib/errors";
import { FontRegistry } from "../src/lib/fontRegistry";
import { composePage, computePageLayout, detectImageFormat, loadPageImage } from "../src/lib/pageComposer";
import { encodeQr } from "../src/lib/qrEncoder";
import { fixturePath, makeTempDir, removeTempDir } from "./helpers";

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

describe("pageComposer", () => {
  describe("computePageLayout", () => {
    it("places the default layout", () => {
      expect(computePageLayout(DEFAULT_PAGE_CONFIG)).toEqual({
        xCenter: 150,
        yAnchor: 300,
        title: { x: 150, y: 300 },
        qr: { x: 75, y: 140, size: 150 },
        number: { x: 150, y: 120 },
      });
    });

    it("follows the configured offsets", () => {
      const page = resolvePageConfig({
        pageWidth: 400,
        pageHeight: 600,
        qrSize: 200,
        titleYOffset: 20,
        qrYOffset: 30,
        numberYOffset: 60,
      });
      expect(computePageLayout(page)).toEqual({
        xCenter: 200,
        yAnchor: 500,
        title: { x: 200, y: 480 },
        qr: { x: 100, y: 270, size: 200 },
        number: { x: 200, y: 240 },
      });
    });
  });

  it("rejects images that are neither PNG nor JPEG", async () => {
    const dir = await makeTempDir();
    try {
      const gifPath = path.join(dir, "bg.gif");
      await writeFile(gifPath, "GIF89a");
      await expect(loadPageImage(gifPath, "background image")).rejects.toThrow(UnsupportedImageError);
    } finally {
      await removeTempDir(dir);
    }
  });

  it("detects image formats from magic bytes", () => {
    expect(detectImageFormat(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0]))).toBe("PNG");
    expect(detectImageFormat(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe("JPEG");
    expect(detectImageFormat(new TextEncoder().encode("GIF89a"))).toBeNull();
  });

  describe("composePage", () => {
    let dir: string;
    let qrPath: string;

    beforeEach(async () => {
      dir = await makeTempDir();
      qrPath = path.join(dir, "1-Ali.png");
      const image = await encodeQr("12345", resolveQrConfig());
      await writeFile(qrPath, image.png);
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it("writes a single-page PDF with title, QR image and identifier", async () => {
      const outputPath = path.join(dir, "1-Ali.pdf");
      await composePage(outputPath, "Ali", "12345", qrPath, resolvePageConfig());

      const pdf = (await readFile(outputPath)).toString("latin1");
      expect(pdf.startsWith("%PDF-")).toBe(true);
      expect(pdf).toContain("(Ali) Tj");
      expect(pdf).toContain("(12345) Tj");
      expect((await readdir(dir)).sort()).toEqual(["1-Ali.pdf", "1-Ali.png"]);
    });

    it("draws the background image when one is configured", async () => {
      const plain = path.join(dir, "plain.pdf");
      const withBackground = path.join(dir, "background.pdf");
      const backgroundPath = path.join(dir, "background.png");
      await writeFile(backgroundPath, (await encodeQr("background", resolveQrConfig({ boxSize: 4 }))).png);
      await composePage(plain, "Ali", "12345", qrPath, resolvePageConfig());
      await composePage(withBackground, "Ali", "12345", qrPath, resolvePageConfig({ backgroundAsset: backgroundPath }));

      const plainImages = countOccurrences((await readFile(plain)).toString("latin1"), "/Subtype /Image");
      const backgroundImages = countOccurrences((await readFile(withBackground)).toString("latin1"), "/Subtype /Image");
      expect(backgroundImages).toBeGreaterThan(plainImages);
    });

    it("uses a preloaded background instead of reading the configured path", async () => {
      const backgroundPath = path.join(dir, "background.png");
      await writeFile(backgroundPath, (await encodeQr("background", resolveQrConfig({ boxSize: 4 }))).png);
      const background = await loadPageImage(backgroundPath);
      const page = resolvePageConfig({ backgroundAsset: path.join(dir, "gone.png") });
      const outputPath = path.join(dir, "1-Ali.pdf");

      await composePage(outputPath, "Ali", "12345", qrPath, page, FontRegistry.withStandardFonts(), { background });
      expect((await readFile(outputPath)).toString("latin1").startsWith("%PDF-")).toBe(true);
    });

    it("refuses text the standard fonts cannot encode without writing a page", async () => {
      const outputPath = path.join(dir, "1-Ali.pdf");
      await expect(
        composePage(outputPath, "\uFBFD\uFEE0\uFECB", "12345", qrPath, resolvePageConfig())
      ).rejects.toThrow(GlyphCoverageError);
      expect(await readdir(dir)).toEqual(["1-Ali.png"]);
    });

    it("embeds a registered font for an Arabic title", async () => {
      const fonts = FontRegistry.withStandardFonts();
      await fonts.register("DejaVuSans", fixturePath("DejaVuSans.ttf"));
      const outputPath = path.join(dir, "1-Ali.pdf");

      await composePage(
        outputPath,
        "\uFBFD\uFEE0\uFECB",
        "12345",
        qrPath,
        resolvePageConfig({ titleFont: "DejaVuSans" }),
        fonts
      );

      const pdf = (await readFile(outputPath)).toString("latin1");
      expect(pdf).toContain("/FontFile2");
      expect(pdf).toContain("(12345) Tj");
    });

    it("fails on a missing QR image without writing a page", async () => {
      const outputPath = path.join(dir, "2-Sara.pdf");
      await expect(
        composePage(outputPath, "Sara", "7", path.join(dir, "missing.png"), resolvePageConfig())
      ).rejects.toThrow(AssetNotFoundError);
      expect(await readdir(dir)).toEqual(["1-Ali.png"]);
    });

    it("fails on a missing background", async () => {
      const page = resolvePageConfig({ backgroundAsset: path.join(dir, "missing-background.png") });
      await expect(composePage(path.join(dir, "out.pdf"), "Ali", "1", qrPath, page)).rejects.toMatchObject({
        code: "ASSET_NOT_FOUND",
      });
    });

    it("fails on an image that is neither PNG nor JPEG", async () => {
      const textPath = path.join(dir, "note.png");
      await writeFile(textPath, "not an image");
      await expect(
        composePage(path.join(dir, "out.pdf"), "Ali", "1", textPath, resolvePageConfig())
      ).rejects.toThrow(UnsupportedImageError);
    });

    it("fails on an unknown font", async () => {
      const page = { ...DEFAULT_PAGE_CONFIG, titleFont: "BNazanin" };
      await expect(composePage(path.join(dir, "out.pdf"), "Ali", "1", qrPath, page)).rejects.toThrow(
        UnknownFontError
      );
    });

    it("fails on an invalid page configuration", async () => {
      const page = { ...DEFAULT_PAGE_CONFIG, qrSize: 500 };
      await expect(composePage(path.join(dir, "out.pdf"), "Ali", "1", qrPath, page)).rejects.toThrow(
        InvalidConfigError
      );
    });
  });
});
