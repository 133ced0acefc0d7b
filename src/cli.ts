import { createRequire } from "node:module";
import { AudiobookConverter } from "./converter.js";
import { DEFAULTS, resolveConfig } from "./config.js";
import { ConfigurationError, ConverterError, errorMessage } from "./errors.js";
import { FfmpegEncoder } from "./ffmpeg.js";
import type { AudioEncoder } from "./ffmpeg.js";
import { Logger, shouldUseColor } from "./logger.js";
import type { LogSink } from "./logger.js";
import { formatBitrate } from "./policy.js";
import type { ConverterConfig, ParsedArgs, RunSummary } from "./types.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export const HELP = `
opusbook v${VERSION} — Convert audiobooks to Opus, optimized for voice

Usage:
  opusbook                            Convert ./original into ./opus
  opusbook -s <dir> -o <dir>          Custom source and output directories
  opusbook -b 24k -w 4                Higher bitrate with 4 parallel workers
  opusbook --stereo keep              Keep stereo channels instead of downmixing

Options:
  -s, --source <dir>       Source directory containing audiobooks (default: ${DEFAULTS.source})
  -o, --output <dir>       Output directory for converted files (default: ${DEFAULTS.output})
  -b, --bitrate <rate>     Target bitrate, e.g. 15k, 20k, 24k, 32k (default: ${DEFAULTS.bitrate})
  -w, --workers <n>        Number of parallel workers (default: CPU count)
  --stereo <strategy>      downmix | keep | increase-bitrate (default: ${DEFAULTS.stereo})
  --no-images              Do not copy or optimize cover images
  --no-skip                Re-convert files even if they already exist
  -v, --verbose            Enable verbose output
  --no-color               Disable colored output
  -h, --help               Show this help message
  --version                Show version number

Supported input formats: mp3, m4a, m4b, aac, flac, wav, ogg, wma, opus
Cover images: cover, folder, album or front with jpg, jpeg, png or webp
`.trim();

const VALUE_FLAGS: Record<string, "source" | "output" | "bitrate" | "workers" | "stereo"> = {
  "-s": "source",
  "--source": "source",
  "-o": "output",
  "--output": "output",
  "-b": "bitrate",
  "--bitrate": "bitrate",
  "-w": "workers",
  "--workers": "workers",
  "--stereo": "stereo",
};

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    source: DEFAULTS.source,
    output: DEFAULTS.output,
    bitrate: DEFAULTS.bitrate,
    stereo: DEFAULTS.stereo,
    images: true,
    skip: true,
    verbose: false,
    color: true,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    let arg = args[i];
    let inline: string | undefined;

    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq > 0) {
      inline = arg.slice(eq + 1);
      arg = arg.slice(0, eq);
    }

    const key = VALUE_FLAGS[arg];
    if (key) {
      const value = inline ?? args[++i];
      if (value === undefined) {
        throw new ConfigurationError(`${arg} requires a value`);
      }
      result[key] = value;
      continue;
    }

    if (inline !== undefined) {
      throw new ConfigurationError(`${arg} does not take a value`);
    }

    switch (arg) {
      case "-h":
      case "--help":
        result.help = true;
        return result;
      case "--version":
        result.version = true;
        return result;
      case "--no-images":
        result.images = false;
        break;
      case "--no-skip":
        result.skip = false;
        break;
      case "-v":
      case "--verbose":
        result.verbose = true;
        break;
      case "--no-color":
        result.color = false;
        break;
      default:
        throw new ConfigurationError(
          arg.startsWith("-") ? `unknown option: ${arg}` : `unexpected argument: ${arg}`,
        );
    }
  }

  return result;
}

function printBanner(logger: Logger, config: ConverterConfig): void {
  logger.divider();
  logger.info("Audiobook to Opus Converter");
  logger.divider();
  logger.info(`Source:  ${config.sourceDir}`);
  logger.info(`Output:  ${config.outputDir}`);
  logger.info(`Bitrate: ${formatBitrate(config.bitrate)} (VBR)`);
  logger.info(`Stereo:  ${config.stereo}`);
  logger.info(`Workers: ${config.workers}`);
  logger.divider();
}

export function printSummary(logger: Logger, results: RunSummary): void {
  logger.divider();
  logger.info(results.interrupted ? "Conversion interrupted" : "Conversion complete");
  logger.divider();
  logger.info(`Total files:    ${results.totalFiles}`);
  logger.success(`Converted:      ${results.audio.converted}`);
  logger.success(`Copied:         ${results.audio.copied}`);
  logger.info(`Skipped:        ${results.audio["skipped-existing"]}`);
  if (results.audio.failed > 0) {
    logger.error(`Failed:         ${results.audio.failed}`);
  }
  const covers = results.images.converted + results.images.copied;
  if (covers > 0 || results.images.failed > 0) {
    logger.info(`Cover images:   ${covers} processed, ${results.images.failed} not processed`);
  }
  logger.info(`Duration:       ${results.duration}`);
  logger.info(`Input size:     ${results.totalSize}`);
  logger.info(`Output size:    ${results.outputSize}`);
  logger.divider();

  if (results.failed.length > 0) {
    logger.error("Failed conversions:");
    results.failed.forEach((f) => logger.error(`  - ${f.file}: ${f.error}`));
  }
}

export interface MainOptions {
  cwd?: string;
  sink?: LogSink;
  /** Overrides the ffmpeg-backed encoder; the dependency check is skipped when given. */
  encoder?: AudioEncoder;
  signal?: AbortSignal;
}

/**
 * Signal handler: the first call aborts the run so it can wind down and
 * print its summary, a repeated call exits at once.
 */
export function createInterruptHandler(
  controller: AbortController,
  exit: (code: number) => void,
  notify: (message: string) => void = (message) => console.error(message),
): () => void {
  return () => {
    if (controller.signal.aborted) {
      exit(EXIT_INTERRUPTED);
      return;
    }
    notify("\n\nConversion interrupted by user. Press Ctrl+C again to force quit.");
    controller.abort();
  };
}

/** Runs the CLI and resolves to the process exit code. */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  let parsed: ParsedArgs;
  let logger = new Logger({ color: shouldUseColor(!argv.includes("--no-color")), sink: options.sink });

  try {
    parsed = parseArgs(argv);
  } catch (err) {
    logger.error(errorMessage(err));
    logger.error("Run opusbook --help for usage");
    return EXIT_FAILURE;
  }

  const print = options.sink?.out ?? console.log;

  if (parsed.help) {
    print(HELP);
    return EXIT_OK;
  }

  if (parsed.version) {
    print(VERSION);
    return EXIT_OK;
  }

  try {
    const config = await resolveConfig(parsed, options.cwd);
    logger = new Logger({ verbose: config.verbose, color: config.color, sink: options.sink });
    printBanner(logger, config);

    let encoder = options.encoder;
    if (!encoder) {
      const ffmpeg = new FfmpegEncoder();
      await ffmpeg.checkDependencies();
      encoder = ffmpeg;
    }

    logger.info("Scanning for audio files...");
    const converter = new AudiobookConverter(config, { encoder, logger });
    const results = await converter.run(options.signal);
    printSummary(logger, results);

    if (results.interrupted) return EXIT_INTERRUPTED;
    return results.audio.failed > 0 ? EXIT_FAILURE : EXIT_OK;
  } catch (err) {
    logger.error(err instanceof ConverterError ? err.message : `Unexpected error: ${errorMessage(err)}`);
    if (logger.verbose && err instanceof Error && err.stack && !(err instanceof ConverterError)) {
      logger.debug(err.stack);
    }
    return EXIT_FAILURE;
  }
}
