import QRCode from "qrcode";
import type { QRCodeSegment } from "qrcode";
import { validateQrConfig } from "./config";
import { EncodingCapacityError, describeError } from "./errors";
import type { ErrorCorrectionLevel, QRConfig, RasterImage } from "./types";

export function moduleCountForVersion(version: number): number {
  return version * 4 + 17;
}

// qrcode refuses an empty string, but an empty segment list yields a valid symbol without payload
function toPayload(data: string): string | QRCodeSegment[] {
  return data === "" ? [] : data;
}

/**
 * Smallest version able to hold `data` at the given level; qrcode picks the
 * numeric / alphanumeric / byte segmentation itself.
 */
export function minimalVersionFor(data: string, errorCorrection: ErrorCorrectionLevel): number {
  try {
    return QRCode.create(toPayload(data), { errorCorrectionLevel: errorCorrection }).version;
  } catch (error) {
    if (/too big/i.test(describeError(error))) {
      throw new EncodingCapacityError(data.length, errorCorrection);
    }
    throw error;
  }
}

/**
 * Renders `data` as a PNG QR symbol. The symbol grows past `config.version`
 * when the data needs it and fails with `EncodingCapacityError` beyond
 * version 40; it never truncates.
 */
export async function encodeQr(data: string, config: QRConfig): Promise<RasterImage> {
  const qr = validateQrConfig(config);
  const version = Math.max(qr.version, minimalVersionFor(data, qr.errorCorrection));
  const png = await QRCode.toBuffer(toPayload(data), {
    type: "png",
    version,
    errorCorrectionLevel: qr.errorCorrection,
    margin: qr.border,
    scale: qr.boxSize,
    color: {
      dark: qr.fillColor,
      light: qr.backColor,
    },
  });
  const moduleCount = moduleCountForVersion(version);
  const side = (moduleCount + qr.border * 2) * qr.boxSize;
  return {
    png,
    width: side,
    height: side,
    version,
    moduleCount,
    errorCorrection: qr.errorCorrection,
  };
}
