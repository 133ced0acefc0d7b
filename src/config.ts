import { z } from "zod";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConfigurationError, errorMessage } from "./errors.js";
import { shouldUseColor } from "./logger.js";
import { parseBitrate } from "./policy.js";
import { STEREO_STRATEGIES } from "./types.js";
import type { ConverterConfig, ParsedArgs } from "./types.js";

export const DEFAULTS = {
  source: "./original",
  output: "./opus",
  bitrate: "20k",
  stereo: "downmix",
} as const;

const bitrateSchema = z.string().transform((value, ctx) => {
  try {
    return parseBitrate(value);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(err) });
    return z.NEVER;
  }
});

const workersSchema = z
  .string()
  .regex(/^\d+$/, "must be a positive integer")
  .transform((value) => parseInt(value, 10))
  .pipe(z.number().int().min(1, "must be at least 1"));

export const argsSchema = z.object({
  source: z.string().min(1, "must not be empty"),
  output: z.string().min(1, "must not be empty"),
  bitrate: bitrateSchema,
  stereo: z.enum(STEREO_STRATEGIES, {
    errorMap: () => ({ message: `must be one of ${STEREO_STRATEGIES.join(", ")}` }),
  }),
  workers: workersSchema.optional(),
  images: z.boolean(),
  skip: z.boolean(),
  verbose: z.boolean(),
  color: z.boolean(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Validates parsed flags into a frozen config. Paths are resolved against `cwd`. */
export async function resolveConfig(args: ParsedArgs, cwd = process.cwd()): Promise<ConverterConfig> {
  const parsed = argsSchema.safeParse(args);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }

  const values = parsed.data;
  const sourceDir = path.resolve(cwd, values.source);
  const outputDir = path.resolve(cwd, values.output);

  const stat = await fs.stat(sourceDir).catch(() => null);
  if (!stat) {
    throw new ConfigurationError(`Source directory not found: ${values.source}`);
  }
  if (!stat.isDirectory()) {
    throw new ConfigurationError(`Source path is not a directory: ${values.source}`);
  }

  if (sourceDir === outputDir) {
    throw new ConfigurationError("Source and output directories must differ");
  }

  const nested = path.relative(sourceDir, outputDir);
  if (!nested.startsWith("..") && !path.isAbsolute(nested)) {
    throw new ConfigurationError("Output directory must not be inside the source directory");
  }

  return Object.freeze({
    sourceDir,
    outputDir,
    bitrate: values.bitrate,
    stereo: values.stereo,
    workers: values.workers ?? os.availableParallelism(),
    images: values.images,
    skipExisting: values.skip,
    verbose: values.verbose,
    color: shouldUseColor(values.color),
  });
}
