/**
 * Errors raised by the badge pipeline.
 *
 * `code` is stable and meant for machines (summaries, exit codes); `message`
 * is for people. Per-record errors are caught by the pipeline and reported in
 * the batch summary, configuration errors abort the run before any row.
 */
export class BadgePipelineError extends Error {
  readonly code: string;
  readonly details?: unknown;

  constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class EncodingCapacityError extends BadgePipelineError {
  constructor(dataLength: number, errorCorrection: string) {
    super(
      "ENCODING_CAPACITY",
      `Data of length ${dataLength} does not fit in a version 40 QR code at error correction level ${errorCorrection}`,
      { dataLength, errorCorrection }
    );
  }
}

export class InvalidConfigError extends BadgePipelineError {
  constructor(message: string, issues?: unknown) {
    super("INVALID_CONFIG", message, issues);
  }
}

export class AssetNotFoundError extends BadgePipelineError {
  readonly assetPath: string;

  constructor(assetPath: string, kind = "asset") {
    super("ASSET_NOT_FOUND", `Missing ${kind}: ${assetPath}`);
    this.assetPath = assetPath;
  }
}

export class UnknownFontError extends BadgePipelineError {
  readonly fontName: string;

  constructor(fontName: string, known: readonly string[]) {
    super("UNKNOWN_FONT", `Font "${fontName}" is not registered (known: ${known.join(", ")})`);
    this.fontName = fontName;
  }
}

export class GlyphCoverageError extends BadgePipelineError {
  readonly fontName: string;

  constructor(fontName: string, char: string) {
    const codePoint = (char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, "0");
    super("GLYPH_COVERAGE", `Font "${fontName}" cannot render U+${codePoint}; register a TrueType font that covers it`, {
      codePoint,
    });
    this.fontName = fontName;
  }
}

export class RowParseError extends BadgePipelineError {
  readonly rowIndex?: number;

  constructor(message: string, rowIndex?: number) {
    super("ROW_PARSE", rowIndex === undefined ? message : `Row ${rowIndex}: ${message}`);
    this.rowIndex = rowIndex;
  }
}

export class TextDecodingError extends BadgePipelineError {
  constructor(text: string, position: number) {
    super("TEXT_DECODING", `Malformed text at position ${position}: ${JSON.stringify(text)}`, { position });
  }
}

export class UnsupportedImageError extends BadgePipelineError {
  constructor(assetPath: string) {
    super("UNSUPPORTED_IMAGE", `Not a PNG or JPEG image: ${assetPath}`);
  }
}

export class ArtifactExistsError extends BadgePipelineError {
  constructor(artifactPath: string) {
    super("ARTIFACT_EXISTS", `Refusing to overwrite ${artifactPath}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isErrnoException(error: unknown, code: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === code
  );
}
