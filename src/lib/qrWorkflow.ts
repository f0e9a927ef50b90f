import { createArtifactArchive } from "./archive";
import { resolvePageConfig, resolvePipelineSettings, resolveQrConfig } from "./config";
import { describeError } from "./errors";
import { removeFileIfExists, writeFileDurable } from "./fileSystem";
import { FontRegistry } from "./fontRegistry";
import { createLogger } from "./logger";
import type { Logger } from "./logger";
import { allocateOutputPath } from "./outputPaths";
import { composePage, loadPageImage } from "./pageComposer";
import type { PageImage } from "./pageComposer";
import { encodeQr } from "./qrEncoder";
import { rawNameOf, readCsvRows, toBadgeRecord } from "./rowSource";
import { shapeText } from "./textShaper";
import type {
  BatchSummary,
  GeneratedArtifact,
  PageConfig,
  PipelineOptions,
  PipelineSettings,
  QRConfig,
  RecordOutcome,
  RecordState,
  Row,
} from "./types";

type RunContext = {
  settings: PipelineSettings;
  qr: QRConfig;
  page: PageConfig;
  fonts: FontRegistry;
  background: PageImage | undefined;
  logger: Logger;
};

type IndexedRow = { row: Row; rowIndex: number };

function* indexRows(rows: Iterable<Row>, skipRows: number): Generator<IndexedRow> {
  let position = 0;
  for (const row of rows) {
    position++;
    if (position <= skipRows) {
      continue;
    }
    yield { row, rowIndex: position - skipRows };
  }
}

async function discardPartialQr(qrImagePath: string, logger: Logger): Promise<void> {
  try {
    await removeFileIfExists(qrImagePath);
  } catch (error) {
    logger.warn(`Could not remove partial QR image ${qrImagePath}: ${describeError(error)}`);
  }
}

/**
 * Runs one row through shape -> encode -> compose. Never throws: failures are
 * logged and returned as an error outcome, and a QR image written for a row
 * whose page then failed is removed again.
 */
async function processRow({ row, rowIndex }: IndexedRow, context: RunContext): Promise<RecordOutcome> {
  const { settings, qr, page, fonts, background, logger } = context;
  const rawName = rawNameOf(row, settings.nameColumn);
  let state: RecordState = "pending";
  let qrImagePath: string | undefined;

  try {
    const record = toBadgeRecord(row, rowIndex, settings);
    const title = shapeText(record.displayName);
    state = "shaped";

    const raster = await encodeQr(record.identifier, qr);
    qrImagePath = await allocateOutputPath(settings.qrDir, rowIndex, record.displayName, "png", {
      onExisting: settings.onExisting,
    });
    await writeFileDurable(qrImagePath, raster.png);
    state = "encoded";

    let artifact: GeneratedArtifact = { qrImagePath };
    if (settings.composePages) {
      const pdfPath = await allocateOutputPath(settings.pdfDir, rowIndex, record.displayName, "pdf", {
        onExisting: settings.onExisting,
      });
      await composePage(pdfPath, title, record.identifier, qrImagePath, page, fonts, { background });
      state = "composed";
      artifact = { qrImagePath, pdfPath };
      logger.info(`PDF generated: ${pdfPath}`);
    } else {
      logger.info(`QR code generated: ${qrImagePath}`);
    }

    return { rowIndex, rawName, status: "ok", state: "done", artifact };
  } catch (error) {
    if (qrImagePath && state === "encoded") {
      await discardPartialQr(qrImagePath, logger);
    }
    const message = describeError(error);
    logger.error(`Row ${rowIndex} ("${rawName}") failed after state "${state}": ${message}`);
    return { rowIndex, rawName, status: "error", state: "failed", failedAfter: state, message, error };
  }
}

/**
 * Generates a QR image and a badge page for every data row.
 *
 * Configuration problems (invalid QR or page settings, unknown fonts, a
 * missing or unreadable background) throw before the first row. A failed
 * archive is reported in `archiveError`. Row problems are recorded
 * in the summary and the batch goes on. With `concurrency > 1` rows run on a
 * bounded pool of async workers; each row still writes its QR image before
 * its page. Aborting `signal` stops new rows from starting.
 */
export async function runBadgePipeline(rows: Iterable<Row>, options: PipelineOptions = {}): Promise<BatchSummary> {
  const settings = resolvePipelineSettings({
    qrDir: options.qrDir,
    pdfDir: options.pdfDir,
    skipRows: options.skipRows,
    nameColumn: options.nameColumn,
    identifierColumn: options.identifierColumn,
    concurrency: options.concurrency,
    composePages: options.composePages,
    onExisting: options.onExisting,
  });
  const qr = resolveQrConfig(options.qr);
  const page = resolvePageConfig(options.page);
  const fonts = options.fonts ?? FontRegistry.withStandardFonts();
  const logger = options.logger ?? createLogger("badges");

  let background: PageImage | undefined;
  if (settings.composePages) {
    fonts.resolve(page.titleFont);
    fonts.resolve(page.numberFont);
    if (page.backgroundAsset) {
      background = await loadPageImage(page.backgroundAsset, "background image");
    }
  }

  const context: RunContext = { settings, qr, page, fonts, background, logger };
  const source = indexRows(rows, settings.skipRows);
  const outcomes: RecordOutcome[] = [];
  let stopped = false;

  // Pulling is synchronous, so row indices follow file order whatever the pool size.
  const take = (): IteratorResult<IndexedRow> => {
    const next = source.next();
    if (!next.done && options.signal?.aborted) {
      stopped = true;
      return { done: true, value: undefined };
    }
    return next;
  };

  const worker = async () => {
    for (let next = take(); !next.done; next = take()) {
      const outcome = await processRow(next.value, context);
      outcomes.push(outcome);
      try {
        options.onRecordComplete?.(outcome);
      } catch (error) {
        logger.warn(`Progress callback failed for row ${outcome.rowIndex}: ${describeError(error)}`);
      }
    }
  };
  await Promise.all(Array.from({ length: settings.concurrency }, worker));

  outcomes.sort((a, b) => a.rowIndex - b.rowIndex);
  const succeeded = outcomes.filter((outcome) => outcome.status === "ok").length;
  const summary: BatchSummary = {
    total: outcomes.length,
    succeeded,
    failed: outcomes.length - succeeded,
    stopped,
    outcomes,
  };

  if (stopped) {
    logger.warn("Stop requested: remaining rows were not started");
  }
  logger.info(`Processed ${summary.total} rows: ${summary.succeeded} succeeded, ${summary.failed} failed`);

  if (options.archivePath) {
    const artifacts = outcomes.flatMap((outcome) => (outcome.artifact ? [outcome.artifact] : []));
    try {
      summary.archivePath = await createArtifactArchive(artifacts, options.archivePath);
      logger.info(`Archive written: ${summary.archivePath}`);
    } catch (error) {
      summary.archiveError = describeError(error);
      logger.error(`Could not write archive ${options.archivePath}: ${summary.archiveError}`);
    }
  }
  return summary;
}

/** Reads `csvPath` (first row treated as a header unless `skipRows` says otherwise) and runs the pipeline. */
export async function generateBadgesFromCsv(csvPath: string, options: PipelineOptions = {}): Promise<BatchSummary> {
  const rows = await readCsvRows(csvPath);
  return runBadgePipeline(rows, { ...options, skipRows: options.skipRows ?? 1 });
}
