import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { PerFileError } from "../errors.js";
import type { AudioEncoder } from "../ffmpeg.js";
import { Logger } from "../logger.js";
import type { LogSink } from "../logger.js";
import type { AudioProbe, ConverterConfig, EncodeJob } from "../types.js";

export function tmpDir(): string {
  return path.join(os.tmpdir(), `opusbook-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

export async function cleanup(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

export async function writeFile(filePath: string, content = "audio"): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

export function makeConfig(workDir: string, overrides: Partial<ConverterConfig> = {}): ConverterConfig {
  return {
    sourceDir: path.join(workDir, "original"),
    outputDir: path.join(workDir, "opus"),
    bitrate: { kbps: 20, unit: "k" },
    stereo: "downmix",
    workers: 2,
    images: true,
    skipExisting: true,
    verbose: false,
    color: false,
    ...overrides,
  };
}

export interface CapturedLogger {
  logger: Logger;
  out: string[];
  err: string[];
  sink: LogSink;
}

export function captureLogger(verbose = false): CapturedLogger {
  const out: string[] = [];
  const err: string[] = [];
  const sink: LogSink = {
    out: (line) => out.push(line),
    err: (line) => err.push(line),
  };
  return { logger: new Logger({ verbose, color: false, sink }), out, err, sink };
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * In-process stand-in for ffmpeg/ffprobe. Probe results and failures are keyed
 * by file base name; encoding writes a small marker file.
 */
export class FakeEncoder implements AudioEncoder {
  probes = new Map<string, AudioProbe>();
  failing = new Set<string>();
  failingProbe = new Set<string>();
  jobs: EncodeJob[] = [];
  delayMs = 0;
  active = 0;
  maxActive = 0;
  onEncode?: (job: EncodeJob) => void;

  private async track<T>(fn: () => Promise<T>): Promise<T> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) await sleep(this.delayMs);
      return await fn();
    } finally {
      this.active--;
    }
  }

  async probe(inputPath: string): Promise<AudioProbe> {
    return this.track(async () => {
      const name = path.basename(inputPath);
      if (this.failingProbe.has(name)) {
        throw new PerFileError(inputPath, "ffprobe exited with code 1: Invalid data found when processing input");
      }
      return this.probes.get(name) ?? { codec: "mp3", channels: 2, bitrate: 64000 };
    });
  }

  async encode(job: EncodeJob, signal?: AbortSignal): Promise<void> {
    return this.track(async () => {
      this.jobs.push(job);
      this.onEncode?.(job);
      const name = path.basename(job.inputPath);
      if (signal?.aborted) {
        await fs.writeFile(job.outputPath, "partial");
        throw new Error("The operation was aborted");
      }
      if (this.failing.has(name)) {
        await fs.writeFile(job.outputPath, "partial");
        throw new PerFileError(job.inputPath, "ffmpeg exited with code 1: boom", { stderr: "boom\n" });
      }
      await fs.writeFile(job.outputPath, `encoded:${name}`);
    });
  }
}
