import { jsPDF } from "jspdf";
import { TOP_MARGIN, validatePageConfig } from "./config";
import { UnsupportedImageError } from "./errors";
import { readAsset, writeFileDurable } from "./fileSystem";
import { FontRegistry } from "./fontRegistry";
import type { PageConfig, RgbColor } from "./types";

type Point = { x: number; y: number };

/**
 * Positions in PDF user space (points, origin at the bottom-left corner).
 * Text points are baselines of horizontally centered strings.
 */
export type PageLayout = {
  xCenter: number;
  yAnchor: number;
  title: Point;
  /** Lower-left corner of the QR square. */
  qr: Point & { size: number };
  number: Point;
};

export function computePageLayout(page: PageConfig): PageLayout {
  const xCenter = page.pageWidth / 2;
  const yAnchor = page.pageHeight - TOP_MARGIN;
  return {
    xCenter,
    yAnchor,
    title: { x: xCenter, y: yAnchor - page.titleYOffset },
    qr: {
      x: xCenter - page.qrSize / 2,
      y: yAnchor - page.qrSize - page.qrYOffset,
      size: page.qrSize,
    },
    number: { x: xCenter, y: yAnchor - page.qrSize - page.numberYOffset },
  };
}

type ImageFormat = "PNG" | "JPEG";

export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  const png = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
  if (bytes.length >= png.length && png.every((byte, i) => bytes[i] === byte)) {
    return "PNG";
  }
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return "JPEG";
  }
  return null;
}

/** An image read from disk and checked to be PNG or JPEG, ready for `addImage`. */
export type PageImage = { dataUrl: string; format: ImageFormat };

export async function loadPageImage(assetPath: string, kind = "image"): Promise<PageImage> {
  const bytes = await readAsset(assetPath, kind);
  const format = detectImageFormat(bytes);
  if (!format) {
    throw new UnsupportedImageError(assetPath);
  }
  const mime = format === "PNG" ? "image/png" : "image/jpeg";
  return { dataUrl: `data:${mime};base64,${bytes.toString("base64")}`, format };
}

function setTextColor(doc: jsPDF, [r, g, b]: RgbColor): void {
  doc.setTextColor(Math.round(r * 255), Math.round(g * 255), Math.round(b * 255));
}

/**
 * Renders one badge page: background (stretched over the page), title, QR
 * image and identifier, in that order. The PDF only appears at `outputPath`
 * once it is completely written.
 *
 * `preloaded.background` replaces reading `pageConfig.backgroundAsset`, so a
 * batch decodes its background once.
 */
export async function composePage(
  outputPath: string,
  titleText: string,
  numberText: string,
  qrImagePath: string,
  pageConfig: PageConfig,
  fonts: FontRegistry = FontRegistry.withStandardFonts(),
  preloaded: { background?: PageImage } = {}
): Promise<void> {
  const page = validatePageConfig(pageConfig);
  // resolve everything up front so a bad font or asset fails before any drawing
  fonts.assertCovers(page.titleFont, titleText);
  fonts.assertCovers(page.numberFont, numberText);
  const background =
    preloaded.background ??
    (page.backgroundAsset ? await loadPageImage(page.backgroundAsset, "background image") : null);
  const qrImage = await loadPageImage(qrImagePath, "QR image");

  const { pageWidth, pageHeight } = page;
  const doc = new jsPDF({
    orientation: pageWidth >= pageHeight ? "landscape" : "portrait",
    unit: "pt",
    format: [pageWidth, pageHeight],
  });
  const embedded = new Set<string>();
  const layout = computePageLayout(page);
  // jsPDF measures y from the top edge
  const fromTop = (y: number) => pageHeight - y;

  if (background) {
    doc.addImage(background.dataUrl, background.format, 0, 0, pageWidth, pageHeight);
  }

  fonts.applyTo(doc, page.titleFont, embedded);
  doc.setFontSize(page.titleFontSize);
  setTextColor(doc, page.titleColor);
  doc.text(titleText, layout.title.x, fromTop(layout.title.y), { align: "center" });

  const { qr } = layout;
  doc.addImage(qrImage.dataUrl, qrImage.format, qr.x, fromTop(qr.y + qr.size), qr.size, qr.size);

  fonts.applyTo(doc, page.numberFont, embedded);
  doc.setFontSize(page.numberFontSize);
  setTextColor(doc, page.numberColor);
  doc.text(numberText, layout.number.x, fromTop(layout.number.y), { align: "center" });

  await writeFileDurable(outputPath, new Uint8Array(doc.output("arraybuffer")));
}
