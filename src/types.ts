export type StereoStrategy = "downmix" | "keep" | "increase-bitrate";

export const STEREO_STRATEGIES = ["downmix", "keep", "increase-bitrate"] as const satisfies readonly StereoStrategy[];

export type ChannelCount = 1 | 2;

export interface Bitrate {
  kbps: number;
  unit: "k";
}

export interface BitratePlan {
  bitrate: Bitrate;
  channels: ChannelCount;
}

export interface ConverterConfig {
  readonly sourceDir: string;
  readonly outputDir: string;
  readonly bitrate: Bitrate;
  readonly stereo: StereoStrategy;
  readonly workers: number;
  readonly images: boolean;
  readonly skipExisting: boolean;
  readonly verbose: boolean;
  readonly color: boolean;
}

export interface ConversionTask {
  kind: "audio";
  inputPath: string;
  relativePath: string;
  outputPath: string;
}

export interface ImageTask {
  kind: "image";
  inputPath: string;
  relativePath: string;
  outputPath: string;
}

export type Task = ConversionTask | ImageTask;

export interface AudioProbe {
  codec?: string;
  channels: number;
  /** bits per second */
  bitrate?: number;
}

export interface EncodeJob {
  inputPath: string;
  outputPath: string;
  plan: BitratePlan;
}

export type OutcomeKind = "converted" | "copied" | "skipped-existing" | "failed";

export type TaskOutcome =
  | { kind: "converted" | "copied"; task: Task; inputBytes: number; outputBytes: number }
  | { kind: "skipped-existing"; task: Task }
  | { kind: "failed"; task: Task; reason: string; details?: string };

export interface FailedFile {
  file: string;
  error: string;
}

export type OutcomeCounts = Record<OutcomeKind, number>;

export interface RunSummary {
  totalFiles: number;
  audio: OutcomeCounts;
  images: OutcomeCounts;
  failed: FailedFile[];
  failedImages: FailedFile[];
  duration: string;
  totalSize: string;
  outputSize: string;
  interrupted: boolean;
}

export interface ParsedArgs {
  source: string;
  output: string;
  bitrate: string;
  workers?: string;
  stereo: string;
  images: boolean;
  skip: boolean;
  verbose: boolean;
  color: boolean;
  help: boolean;
  version: boolean;
}
