import path from "node:path";
import fs from "node:fs/promises";
import type { AudioEncoder } from "./ffmpeg.js";
import { ImageOptimizer } from "./images.js";
import type { Logger } from "./logger.js";
import { computeBitratePlan, formatBitrate, shouldSkipExistingOutput, shouldSkipReencode } from "./policy.js";
import { LaneQueue, runPool } from "./pool.js";
import { OutcomeAggregator } from "./summary.js";
import { errorMessage, PerFileError } from "./errors.js";
import { isAudioFile, isCoverImage, tempPathFor } from "./utils.js";
import type { ConversionTask, ConverterConfig, ImageTask, RunSummary, Task, TaskOutcome } from "./types.js";

export interface ConverterDeps {
  encoder: AudioEncoder;
  logger: Logger;
  images?: ImageOptimizer;
}

export interface CollectedTasks {
  audio: ConversionTask[];
  images: ImageTask[];
  rejected: TaskOutcome[];
}

interface ScannedFile {
  relativePath: string;
  error?: string;
}

const CANCELLED = "cancelled";

export class AudiobookConverter {
  readonly config: ConverterConfig;
  private encoder: AudioEncoder;
  private logger: Logger;
  private images: ImageOptimizer;

  constructor(config: ConverterConfig, deps: ConverterDeps) {
    this.config = config;
    this.encoder = deps.encoder;
    this.logger = deps.logger;
    this.images = deps.images ?? new ImageOptimizer(deps.logger);
  }

  async run(signal?: AbortSignal): Promise<RunSummary> {
    const startTime = Date.now();
    const tasks = await this.collectTasks();
    const stats = new OutcomeAggregator(tasks.audio.length + tasks.images.length + tasks.rejected.length);

    if (tasks.audio.length === 0 && tasks.rejected.length === 0) {
      this.logger.warn(`No audio files found in ${this.config.sourceDir}`);
      return stats.summarize(Date.now() - startTime, false);
    }

    this.logger.info(
      tasks.images.length > 0
        ? `Found ${tasks.audio.length} audio files and ${tasks.images.length} cover images`
        : `Found ${tasks.audio.length} audio files`,
    );

    await fs.mkdir(this.config.outputDir, { recursive: true });

    for (const outcome of tasks.rejected) {
      stats.record(outcome);
      this.report(outcome, stats);
    }

    const queue = new LaneQueue<Task>(tasks.audio, tasks.images);
    const remaining = await runPool(
      queue,
      this.config.workers,
      async (task) => {
        const outcome = await this.processTask(task, signal);
        stats.record(outcome);
        this.report(outcome, stats);
      },
      signal,
    );

    for (const task of remaining) {
      stats.record({ kind: "failed", task, reason: CANCELLED });
    }

    return stats.summarize(Date.now() - startTime, signal?.aborted ?? false);
  }

  /**
   * Lists audio files and the cover images that sit in the same directories,
   * sorted by relative path. Entries that cannot be stat'ed, and audio files
   * whose output path is already claimed by an earlier file, come back as
   * `failed` outcomes in `rejected`.
   */
  async collectTasks(): Promise<CollectedTasks> {
    const { sourceDir, outputDir } = this.config;
    const nestedOutput = path.relative(sourceDir, outputDir);
    const insideOutput = (entry: string): boolean =>
      nestedOutput !== "" &&
      !nestedOutput.startsWith("..") &&
      !path.isAbsolute(nestedOutput) &&
      (entry === nestedOutput || entry.startsWith(nestedOutput + path.sep));

    const entries = (await fs.readdir(sourceDir, { recursive: true })).sort((a, b) => a.localeCompare(b));
    const candidates = entries.filter(
      (entry) => (isAudioFile(entry) || isCoverImage(entry)) && !insideOutput(entry),
    );

    const files = await Promise.all(
      candidates.map(async (relativePath): Promise<ScannedFile | null> => {
        try {
          const stat = await fs.stat(path.join(sourceDir, relativePath));
          return stat.isFile() ? { relativePath } : null;
        } catch (err) {
          return { relativePath, error: errorMessage(err) };
        }
      }),
    );

    const audio: ConversionTask[] = [];
    const covers: ScannedFile[] = [];
    const rejected: TaskOutcome[] = [];
    const claimed = new Map<string, string>();

    for (const file of files) {
      if (file === null) continue;
      if (!isAudioFile(file.relativePath)) {
        covers.push(file);
        continue;
      }

      const { dir, name } = path.parse(file.relativePath);
      const task: ConversionTask = {
        kind: "audio",
        inputPath: path.join(sourceDir, file.relativePath),
        relativePath: file.relativePath,
        outputPath: path.join(outputDir, dir, `${name}.opus`),
      };

      const owner = claimed.get(task.outputPath);
      if (file.error !== undefined) {
        rejected.push({ kind: "failed", task, reason: file.error });
      } else if (owner !== undefined) {
        rejected.push({ kind: "failed", task, reason: `output path collides with ${owner}` });
      } else {
        claimed.set(task.outputPath, task.relativePath);
        audio.push(task);
      }
    }

    if (!this.config.images) {
      return { audio, images: [], rejected };
    }

    const audioDirs = new Set(
      files.flatMap((file) => (file && isAudioFile(file.relativePath) ? [path.dirname(file.relativePath)] : [])),
    );
    const images: ImageTask[] = [];
    for (const file of covers) {
      if (!audioDirs.has(path.dirname(file.relativePath))) continue;
      const task: ImageTask = {
        kind: "image",
        inputPath: path.join(sourceDir, file.relativePath),
        relativePath: file.relativePath,
        outputPath: path.join(outputDir, file.relativePath),
      };
      if (file.error !== undefined) {
        rejected.push({ kind: "failed", task, reason: file.error });
      } else {
        images.push(task);
      }
    }

    return { audio, images, rejected };
  }

  /** Never rejects: per-file errors become a `failed` outcome. */
  async processTask(task: Task, signal?: AbortSignal): Promise<TaskOutcome> {
    try {
      if (await shouldSkipExistingOutput(task.outputPath, this.config.skipExisting)) {
        return { kind: "skipped-existing", task };
      }
      return task.kind === "audio" ? await this.convertAudio(task, signal) : await this.convertImage(task);
    } catch (err) {
      if (signal?.aborted) {
        return { kind: "failed", task, reason: CANCELLED };
      }
      return {
        kind: "failed",
        task,
        reason: errorMessage(err),
        details: err instanceof PerFileError ? err.stderr : undefined,
      };
    }
  }

  private async convertAudio(task: ConversionTask, signal?: AbortSignal): Promise<TaskOutcome> {
    const probe = await this.encoder.probe(task.inputPath, signal);
    const plan = computeBitratePlan(this.config.bitrate, this.config.stereo, probe.channels);
    const copy = shouldSkipReencode(probe.codec, probe.bitrate, plan.bitrate);

    this.logger.debug(
      `${task.relativePath}: ${probe.codec ?? "unknown"} ${probe.channels}ch -> ` +
        `${copy ? "copy" : `${formatBitrate(plan.bitrate)} ${plan.channels}ch`}`,
    );

    return this.writeAtomically(task, async (tempPath) => {
      if (copy) {
        await fs.copyFile(task.inputPath, tempPath);
        return "copied";
      }
      await this.encoder.encode({ inputPath: task.inputPath, outputPath: tempPath, plan }, signal);
      return "converted";
    });
  }

  private async convertImage(task: ImageTask): Promise<TaskOutcome> {
    return this.writeAtomically(task, (tempPath) => this.images.optimize(task.inputPath, tempPath));
  }

  /**
   * Writes through a hidden temporary sibling, then renames it over the output
   * path. The temporary file is removed if anything fails.
   */
  private async writeAtomically(
    task: Task,
    write: (tempPath: string) => Promise<"converted" | "copied">,
  ): Promise<TaskOutcome> {
    await fs.mkdir(path.dirname(task.outputPath), { recursive: true });
    const tempPath = tempPathFor(task.outputPath);

    try {
      const kind = await write(tempPath);

      const [inputStats, tempStats] = await Promise.all([fs.stat(task.inputPath), fs.stat(tempPath)]);
      if (tempStats.size === 0) {
        throw new PerFileError(task.inputPath, "Generated file is empty");
      }

      await fs.rename(tempPath, task.outputPath);
      return { kind, task, inputBytes: inputStats.size, outputBytes: tempStats.size };
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw err;
    }
  }

  private report(outcome: TaskOutcome, stats: OutcomeAggregator): void {
    const prefix = `[${stats.completed}/${stats.totalFiles}]`;
    const target = path.relative(this.config.outputDir, outcome.task.outputPath);
    const isAudio = outcome.task.kind === "audio";

    switch (outcome.kind) {
      case "converted":
        this.logger.success(`${prefix} ${isAudio ? "Converted" : "Optimized cover"}: ${target}`);
        break;
      case "copied":
        this.logger.success(`${prefix} ${isAudio ? "Copied (already opus)" : "Copied cover"}: ${target}`);
        break;
      case "skipped-existing":
        this.logger.info(`${prefix} Skipped (already exists): ${target}`);
        break;
      case "failed":
        if (isAudio) {
          this.logger.error(`${prefix} Failed: ${outcome.task.relativePath} - ${outcome.reason}`);
        } else {
          this.logger.warn(`${prefix} Cover not processed: ${outcome.task.relativePath} - ${outcome.reason}`);
        }
        if (outcome.details) {
          this.logger.debug(outcome.details.trim());
        }
        break;
    }
  }
}
