/**
 * ffmpeg/ffprobe invocation.
 *
 * All decoding and encoding is delegated to these tools; this module only
 * builds argument lists, runs the processes and interprets their output.
 */

import { spawn } from "node:child_process";
import { z } from "zod";
import { MissingDependencyError, PerFileError, errorMessage } from "./errors.js";
import { formatBitrate } from "./policy.js";
import type { AudioProbe, EncodeJob } from "./types.js";

export type SpawnResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export interface RunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Encoder seam used by the converter; tests substitute an in-process fake. */
export interface AudioEncoder {
  probe(inputPath: string, signal?: AbortSignal): Promise<AudioProbe>;
  encode(job: EncodeJob, signal?: AbortSignal): Promise<void>;
}

export const ENCODE_TIMEOUT_MS = 60 * 60 * 1000;

/**
 * Execute a command with timeout and output capture. An abort kills the child.
 */
export async function run(cmd: string, args: string[], opts: RunOptions = {}): Promise<SpawnResult> {
  const timeoutMs = opts.timeoutMs ?? ENCODE_TIMEOUT_MS;

  return await new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      stdio: ["ignore", "pipe", "pipe"],
      signal: opts.signal,
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const settle = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      fn();
    };

    const timer = setTimeout(() => {
      child.kill("SIGKILL");
      settle(() => reject(new Error(`Command timed out after ${timeoutMs}ms: ${cmd}`)));
    }, timeoutMs);

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");

    child.stdout.on("data", (data: string) => {
      stdout += data;
    });

    child.stderr.on("data", (data: string) => {
      stderr += data;
    });

    child.on("error", (err) => settle(() => reject(err)));

    child.on("close", (code) => settle(() => resolve({ code: code ?? -1, stdout, stderr })));
  });
}

const probeSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        codec_name: z.string().optional(),
        channels: z.number().optional(),
        bit_rate: z.string().optional(),
      }),
    )
    .default([]),
  format: z.object({ bit_rate: z.string().optional() }).optional(),
});

function parseRate(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const rate = parseInt(value, 10);
  return Number.isNaN(rate) || rate <= 0 ? undefined : rate;
}

/** Reads the first audio stream out of `ffprobe -print_format json` output. */
export function parseProbeOutput(inputPath: string, raw: string): AudioProbe {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new PerFileError(inputPath, `unreadable ffprobe output: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = probeSchema.safeParse(json);
  if (!parsed.success) {
    throw new PerFileError(inputPath, "unexpected ffprobe output");
  }

  const stream = parsed.data.streams.find((s) => s.codec_type === "audio");
  if (!stream) {
    throw new PerFileError(inputPath, "no audio stream found");
  }

  return {
    codec: stream.codec_name,
    channels: stream.channels ?? 1,
    bitrate: parseRate(stream.bit_rate) ?? parseRate(parsed.data.format?.bit_rate),
  };
}

export function buildEncodeArgs(job: EncodeJob): string[] {
  return [
    "-y",
    "-v", "error",
    "-i", job.inputPath,
    "-map", "0:a",
    "-map_metadata", "0",
    "-c:a", "libopus",
    "-b:a", formatBitrate(job.plan.bitrate),
    "-vbr", "on",
    "-compression_level", "10",
    "-application", "voip",
    "-ac", String(job.plan.channels),
    "-f", "opus",
    job.outputPath,
  ];
}

function lastLine(text: string): string {
  const lines = text.trim().split("\n");
  return lines[lines.length - 1]?.trim() ?? "";
}

export class FfmpegEncoder implements AudioEncoder {
  constructor(
    private readonly ffmpegPath = "ffmpeg",
    private readonly ffprobePath = "ffprobe",
    private readonly timeoutMs = ENCODE_TIMEOUT_MS,
  ) {}

  /** Fails with MissingDependencyError unless both tools run and libopus is built in. */
  async checkDependencies(): Promise<void> {
    for (const tool of [this.ffmpegPath, this.ffprobePath]) {
      const ok = await run(tool, ["-version"], { timeoutMs: 5000 })
        .then((result) => result.code === 0)
        .catch(() => false);
      if (!ok) {
        throw new MissingDependencyError(tool, `${tool} is not installed. Please install it first.`);
      }
    }

    const codecs = await run(this.ffmpegPath, ["-hide_banner", "-codecs"], { timeoutMs: 5000 });
    if (!codecs.stdout.includes("libopus")) {
      throw new MissingDependencyError("libopus", `${this.ffmpegPath} does not have Opus codec support.`);
    }
  }

  async probe(inputPath: string, signal?: AbortSignal): Promise<AudioProbe> {
    const result = await run(
      this.ffprobePath,
      ["-v", "error", "-print_format", "json", "-show_format", "-show_streams", inputPath],
      { timeoutMs: this.timeoutMs, signal },
    );
    if (result.code !== 0) {
      throw new PerFileError(inputPath, `ffprobe exited with code ${result.code}: ${lastLine(result.stderr)}`, {
        stderr: result.stderr,
      });
    }
    return parseProbeOutput(inputPath, result.stdout);
  }

  async encode(job: EncodeJob, signal?: AbortSignal): Promise<void> {
    const result = await run(this.ffmpegPath, buildEncodeArgs(job), { timeoutMs: this.timeoutMs, signal });
    if (result.code !== 0) {
      throw new PerFileError(job.inputPath, `ffmpeg exited with code ${result.code}: ${lastLine(result.stderr)}`, {
        stderr: result.stderr,
      });
    }
  }
}
