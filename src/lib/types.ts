import type { Logger } from "./logger";
import type { FontRegistry } from "./fontRegistry";

export type BadgeRecord = Readonly<{
  displayName: string;
  identifier: string;
  /** 1-based position among the data rows, header rows excluded. */
  rowIndex: number;
}>;

/** A row as delivered by a row source: cells addressed by column position. */
export type Row = readonly unknown[];

export type ErrorCorrectionLevel = "L" | "M" | "Q" | "H";

export type QRConfig = {
  version: number;
  errorCorrection: ErrorCorrectionLevel;
  boxSize: number;
  border: number;
  /** Hex color (`#RGB`, `#RRGGBB` or `#RRGGBBAA`) of the dark modules. */
  fillColor: string;
  backColor: string;
};

/** RGB components, each in [0, 1]. */
export type RgbColor = readonly [number, number, number];

export type PageConfig = {
  pageWidth: number;
  pageHeight: number;
  /** Path of a PNG or JPEG stretched over the whole page. */
  backgroundAsset?: string;
  titleFont: string;
  titleFontSize: number;
  titleColor: RgbColor;
  numberFont: string;
  numberFontSize: number;
  numberColor: RgbColor;
  qrSize: number;
  titleYOffset: number;
  qrYOffset: number;
  numberYOffset: number;
};

export type RasterImage = {
  png: Buffer;
  width: number;
  height: number;
  version: number;
  moduleCount: number;
  errorCorrection: ErrorCorrectionLevel;
};

export type GeneratedArtifact = Readonly<{
  qrImagePath: string;
  /** Absent when pages are not composed (QR-only runs). */
  pdfPath?: string;
}>;

export type CollisionPolicy = "overwrite" | "fail";

export type RecordState = "pending" | "shaped" | "encoded" | "composed" | "done" | "failed";

export type RecordOutcome = {
  rowIndex: number;
  rawName: string;
  status: "ok" | "error";
  /** `"done"` or `"failed"`. */
  state: RecordState;
  /** For failures, the last state the record reached before the failing step. */
  failedAfter?: RecordState;
  artifact?: GeneratedArtifact;
  message?: string;
  error?: unknown;
};

export type BatchSummary = {
  total: number;
  succeeded: number;
  failed: number;
  /** True when the stop signal prevented some rows from starting. */
  stopped: boolean;
  outcomes: RecordOutcome[];
  archivePath?: string;
  /** Set when `archivePath` was requested but the zip could not be written. */
  archiveError?: string;
};

export type ColumnMapping = {
  nameColumn: number;
  identifierColumn: number;
};

export type PipelineSettings = ColumnMapping & {
  qrDir: string;
  pdfDir: string;
  skipRows: number;
  concurrency: number;
  composePages: boolean;
  onExisting: CollisionPolicy;
};

export type PipelineOptions = Partial<PipelineSettings> & {
  qr?: Partial<QRConfig>;
  page?: Partial<PageConfig>;
  fonts?: FontRegistry;
  /** Aborting stops new rows from starting; rows in flight finish. */
  signal?: AbortSignal;
  /** When set, succeeded artifacts are bundled into this zip file. */
  archivePath?: string;
  logger?: Logger;
  /** Called once per finished row; an exception thrown here is logged and ignored. */
  onRecordComplete?: (outcome: RecordOutcome) => void;
};
