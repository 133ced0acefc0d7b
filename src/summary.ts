import { formatBytes, formatDuration } from "./utils.js";
import type { FailedFile, OutcomeCounts, RunSummary, TaskOutcome } from "./types.js";

function emptyCounts(): OutcomeCounts {
  return { converted: 0, copied: 0, "skipped-existing": 0, failed: 0 };
}

/**
 * Collects task outcomes as they complete. Only counts and sums are kept, so
 * the summary does not depend on completion order.
 */
export class OutcomeAggregator {
  private audio = emptyCounts();
  private images = emptyCounts();
  private failed: FailedFile[] = [];
  private failedImages: FailedFile[] = [];
  private inputBytes = 0;
  private outputBytes = 0;
  private recorded = 0;

  constructor(readonly totalFiles: number) {}

  get completed(): number {
    return this.recorded;
  }

  record(outcome: TaskOutcome): void {
    const counts = outcome.task.kind === "audio" ? this.audio : this.images;
    counts[outcome.kind]++;
    this.recorded++;

    if (outcome.kind === "failed") {
      const entry = { file: outcome.task.inputPath, error: outcome.reason };
      (outcome.task.kind === "audio" ? this.failed : this.failedImages).push(entry);
    } else if (outcome.kind === "converted" || outcome.kind === "copied") {
      this.inputBytes += outcome.inputBytes;
      this.outputBytes += outcome.outputBytes;
    }
  }

  summarize(elapsedMs: number, interrupted: boolean): RunSummary {
    const byFile = (a: FailedFile, b: FailedFile) => a.file.localeCompare(b.file);
    return {
      totalFiles: this.totalFiles,
      audio: { ...this.audio },
      images: { ...this.images },
      failed: [...this.failed].sort(byFile),
      failedImages: [...this.failedImages].sort(byFile),
      duration: formatDuration(elapsedMs),
      totalSize: formatBytes(this.inputBytes),
      outputSize: formatBytes(this.outputBytes),
      interrupted,
    };
  }
}
