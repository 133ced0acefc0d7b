import path from "node:path";
import crypto from "node:crypto";

const AUDIO_FORMATS = ["mp3", "m4a", "m4b", "aac", "flac", "wav", "ogg", "wma", "opus"];
const COVER_NAMES = ["cover", "folder", "album", "front"];
const COVER_FORMATS = ["jpg", "jpeg", "png", "webp"];

function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase().slice(1);
}

export function isAudioFile(filePath: string): boolean {
  return AUDIO_FORMATS.includes(extensionOf(filePath));
}

export function isCoverImage(filePath: string): boolean {
  const name = path.parse(filePath).name.toLowerCase();
  return COVER_NAMES.includes(name) && COVER_FORMATS.includes(extensionOf(filePath));
}

/** Hidden sibling of `outputPath` that keeps its extension, so tools infer the same format. */
export function tempPathFor(outputPath: string): string {
  const { dir, ext } = path.parse(outputPath);
  return path.join(dir, `.opusbook-${crypto.randomBytes(8).toString("hex")}${ext}`);
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(2)} ${units[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
}
