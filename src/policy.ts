import fs from "node:fs/promises";
import { ConfigurationError } from "./errors.js";
import type { Bitrate, BitratePlan, StereoStrategy } from "./types.js";

/**
 * Multiplier applied to the requested bitrate for stereo input under the
 * `increase-bitrate` strategy. The product is floored to whole kbps, so
 * 24k becomes 38k rather than 38.4k.
 */
export const STEREO_BITRATE_FACTOR = 1.6;

const BITRATE_PATTERN = /^(-?\d+)(k)$/;

export function parseBitrate(text: string): Bitrate {
  const match = BITRATE_PATTERN.exec(text.trim());
  if (!match) {
    throw new ConfigurationError(`invalid bitrate "${text}": expected <integer>k, e.g. 20k`);
  }

  const kbps = parseInt(match[1], 10);
  if (kbps <= 0) {
    throw new ConfigurationError(`invalid bitrate "${text}": must be greater than zero`);
  }

  return { kbps, unit: "k" };
}

export function formatBitrate(bitrate: Bitrate): string {
  return `${bitrate.kbps}${bitrate.unit}`;
}

export function bitsPerSecond(bitrate: Bitrate): number {
  return bitrate.kbps * 1000;
}

export function computeBitratePlan(requested: Bitrate, strategy: StereoStrategy, channelCount: number): BitratePlan {
  if (channelCount <= 1) {
    return { bitrate: requested, channels: 1 };
  }

  switch (strategy) {
    case "downmix":
      return { bitrate: requested, channels: 1 };
    case "keep":
      return { bitrate: requested, channels: 2 };
    case "increase-bitrate":
      return {
        // epsilon absorbs binary representation error (15 * 1.6 = 24.000000000000004)
        bitrate: { kbps: Math.floor(requested.kbps * STEREO_BITRATE_FACTOR + 1e-9), unit: requested.unit },
        channels: 2,
      };
    default: {
      const unreachable: never = strategy;
      throw new ConfigurationError(`unknown stereo strategy: ${String(unreachable)}`);
    }
  }
}

/** A file already in Opus at or below the planned bitrate is copied, not re-encoded. */
export function shouldSkipReencode(
  existingCodec: string | undefined,
  existingBitrate: number | undefined,
  plannedBitrate: Bitrate,
): boolean {
  if (existingCodec?.toLowerCase() !== "opus" || existingBitrate === undefined) {
    return false;
  }
  return existingBitrate <= bitsPerSecond(plannedBitrate);
}

export async function shouldSkipExistingOutput(outputPath: string, skipExisting: boolean): Promise<boolean> {
  if (!skipExisting) return false;
  return fs
    .access(outputPath)
    .then(() => true)
    .catch(() => false);
}
