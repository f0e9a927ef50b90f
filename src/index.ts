export * from "./lib/types";
export * from "./lib/errors";
export {
  DEFAULT_PAGE_CONFIG,
  DEFAULT_PIPELINE_SETTINGS,
  DEFAULT_QR_CONFIG,
  MAX_QR_VERSION,
  TOP_MARGIN,
  resolvePageConfig,
  resolvePipelineSettings,
  resolveQrConfig,
  validatePageConfig,
  validateQrConfig,
} from "./lib/config";
export { createLogger, levelFromEnv, silentLogger } from "./lib/logger";
export type { LogLevel, Logger } from "./lib/logger";
export { containsArabicScript, reshape, shapeText, toVisualOrder } from "./lib/textShaper";
export { encodeQr, minimalVersionFor, moduleCountForVersion } from "./lib/qrEncoder";
export { allocateOutputPath, formatArtifactName } from "./lib/outputPaths";
export { FontRegistry } from "./lib/fontRegistry";
export type { RegisteredFont } from "./lib/fontRegistry";
export { composePage, computePageLayout, detectImageFormat, loadPageImage } from "./lib/pageComposer";
export type { PageImage, PageLayout } from "./lib/pageComposer";
export { parseCsvRows, readCsvRows, toBadgeRecord } from "./lib/rowSource";
export { createArtifactArchive } from "./lib/archive";
export { generateBadgesFromCsv, runBadgePipeline } from "./lib/qrWorkflow";
