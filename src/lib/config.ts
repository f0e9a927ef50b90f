import { z } from "zod";
import { InvalidConfigError } from "./errors";
import type { PageConfig, PipelineSettings, QRConfig } from "./types";

/** Distance from the top edge of the page to the layout anchor. Not configurable. */
export const TOP_MARGIN = 100;

export const MAX_QR_VERSION = 40;

export const DEFAULT_QR_CONFIG: Readonly<QRConfig> = {
  version: 3,
  errorCorrection: "L",
  boxSize: 10,
  border: 4,
  fillColor: "#000000",
  backColor: "#ffffff",
};

export const DEFAULT_PAGE_CONFIG: Readonly<PageConfig> = {
  pageWidth: 300,
  pageHeight: 400,
  titleFont: "Helvetica",
  titleFontSize: 16,
  titleColor: [0, 0, 0],
  numberFont: "Helvetica",
  numberFontSize: 12,
  numberColor: [0, 0, 0],
  qrSize: 150,
  titleYOffset: 0,
  qrYOffset: 10,
  numberYOffset: 30,
};

export const DEFAULT_PIPELINE_SETTINGS: Readonly<PipelineSettings> = {
  qrDir: "QR_codes",
  pdfDir: "PDF_files",
  skipRows: 0,
  nameColumn: 0,
  identifierColumn: 1,
  concurrency: 1,
  composePages: true,
  onExisting: "overwrite",
};

const hexColor = z
  .string()
  .regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/, "expected #RGB, #RRGGBB or #RRGGBBAA");

export const qrConfigSchema = z.object({
  version: z.number().int().min(1).max(MAX_QR_VERSION),
  errorCorrection: z.enum(["L", "M", "Q", "H"]),
  boxSize: z.number().int().positive(),
  border: z.number().int().nonnegative(),
  fillColor: hexColor,
  backColor: hexColor,
});

const unit = z.number().min(0).max(1);
const rgb = z.tuple([unit, unit, unit]);
const positive = z.number().finite().positive();
const offset = z.number().finite().nonnegative();

export const pageConfigSchema = z
  .object({
    pageWidth: positive,
    pageHeight: positive,
    backgroundAsset: z.string().min(1).optional(),
    titleFont: z.string().min(1),
    titleFontSize: positive,
    titleColor: rgb,
    numberFont: z.string().min(1),
    numberFontSize: positive,
    numberColor: rgb,
    qrSize: positive,
    titleYOffset: offset,
    qrYOffset: offset,
    numberYOffset: offset,
  })
  .refine((page) => page.qrSize <= Math.min(page.pageWidth, page.pageHeight), {
    message: "qrSize must not exceed the smaller page dimension",
    path: ["qrSize"],
  });

const columnIndex = z.number().int().nonnegative();

export const pipelineSettingsSchema = z.object({
  qrDir: z.string().min(1),
  pdfDir: z.string().min(1),
  skipRows: z.number().int().nonnegative(),
  nameColumn: columnIndex,
  identifierColumn: columnIndex,
  concurrency: z.number().int().positive(),
  composePages: z.boolean(),
  onExisting: z.enum(["overwrite", "fail"]),
});

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join(".") || label}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigError(`Invalid ${label}: ${summary}`, result.error.issues);
  }
  return result.data;
}

/** Overrides win over defaults; keys set to `undefined` keep the default. */
function merge(defaults: object, overrides: object | undefined): Record<string, unknown> {
  const defined = Object.entries(overrides ?? {}).filter(([, value]) => value !== undefined);
  return { ...defaults, ...Object.fromEntries(defined) };
}

export function validateQrConfig(config: unknown): QRConfig {
  return validate(qrConfigSchema, config, "QR configuration");
}

export function resolveQrConfig(overrides?: Partial<QRConfig>): QRConfig {
  return validateQrConfig(merge(DEFAULT_QR_CONFIG, overrides));
}

export function validatePageConfig(config: unknown): PageConfig {
  return validate(pageConfigSchema, config, "page configuration");
}

export function resolvePageConfig(overrides?: Partial<PageConfig>): PageConfig {
  return validatePageConfig(merge(DEFAULT_PAGE_CONFIG, overrides));
}

export function resolvePipelineSettings(overrides?: Partial<PipelineSettings>): PipelineSettings {
  return validate(pipelineSettingsSchema, merge(DEFAULT_PIPELINE_SETTINGS, overrides), "pipeline settings");
}
