import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parseArgs } from "../cli.js";
import { resolveConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { cleanup, tmpDir } from "./helpers.js";

const argv = (...args: string[]) => ["node", "opusbook", ...args];

describe("parseArgs", () => {
  it("applies defaults", () => {
    expect(parseArgs(argv())).toEqual({
      source: "./original",
      output: "./opus",
      bitrate: "20k",
      stereo: "downmix",
      images: true,
      skip: true,
      verbose: false,
      color: true,
      help: false,
      version: false,
    });
  });

  it("reads short and long flags", () => {
    const parsed = parseArgs(
      argv("-s", "books", "--output", "out", "-b", "24k", "-w", "4", "--stereo", "keep", "--no-images", "--no-skip", "-v", "--no-color"),
    );
    expect(parsed).toMatchObject({
      source: "books",
      output: "out",
      bitrate: "24k",
      workers: "4",
      stereo: "keep",
      images: false,
      skip: false,
      verbose: true,
      color: false,
    });
  });

  it("accepts --flag=value", () => {
    expect(parseArgs(argv("--bitrate=32k", "--stereo=increase-bitrate")).bitrate).toBe("32k");
    expect(parseArgs(argv("--stereo=increase-bitrate")).stereo).toBe("increase-bitrate");
  });

  it("stops at --help", () => {
    expect(parseArgs(argv("-h", "--badopt")).help).toBe(true);
  });

  it("rejects unknown options", () => {
    expect(() => parseArgs(argv("--badopt"))).toThrow("unknown option: --badopt");
  });

  it("rejects positional arguments", () => {
    expect(() => parseArgs(argv("books"))).toThrow("unexpected argument: books");
  });

  it("rejects a value flag without a value", () => {
    expect(() => parseArgs(argv("-b"))).toThrow("-b requires a value");
  });

  it("rejects a value on a boolean flag", () => {
    expect(() => parseArgs(argv("--verbose=yes"))).toThrow("--verbose does not take a value");
  });
});

describe("resolveConfig", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir();
    await fs.mkdir(path.join(workDir, "original"), { recursive: true });
  });

  afterEach(async () => {
    await cleanup(workDir);
  });

  it("resolves defaults against the working directory", async () => {
    const config = await resolveConfig(parseArgs(argv("--no-color")), workDir);
    expect(config).toEqual({
      sourceDir: path.join(workDir, "original"),
      outputDir: path.join(workDir, "opus"),
      bitrate: { kbps: 20, unit: "k" },
      stereo: "downmix",
      workers: os.availableParallelism(),
      images: true,
      skipExisting: true,
      verbose: false,
      color: false,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("reads explicit values", async () => {
    const config = await resolveConfig(parseArgs(argv("-w", "3", "-b", "24k", "--stereo", "keep", "--no-skip")), workDir);
    expect(config.workers).toBe(3);
    expect(config.bitrate).toEqual({ kbps: 24, unit: "k" });
    expect(config.stereo).toBe("keep");
    expect(config.skipExisting).toBe(false);
  });

  it("rejects a malformed bitrate", async () => {
    await expect(resolveConfig(parseArgs(argv("-b", "abc")), workDir)).rejects.toThrow(
      'bitrate: invalid bitrate "abc": expected <integer>k, e.g. 20k',
    );
  });

  it("rejects an unknown stereo strategy", async () => {
    await expect(resolveConfig(parseArgs(argv("--stereo", "surround")), workDir)).rejects.toThrow(
      "stereo: must be one of downmix, keep, increase-bitrate",
    );
  });

  it.each([
    ["0", "workers: must be at least 1"],
    ["abc", "workers: must be a positive integer"],
    ["-2", "workers: must be a positive integer"],
  ])("rejects %s workers", async (workers, message) => {
    await expect(resolveConfig(parseArgs(argv("-w", workers)), workDir)).rejects.toThrow(message);
  });

  it("rejects a missing source directory", async () => {
    const err = await resolveConfig(parseArgs(argv("-s", "missing")), workDir).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConfigurationError);
    expect((err as ConfigurationError).message).toBe("Source directory not found: missing");
  });

  it("rejects a source that is a file", async () => {
    await fs.writeFile(path.join(workDir, "file.mp3"), "x");
    await expect(resolveConfig(parseArgs(argv("-s", "file.mp3")), workDir)).rejects.toThrow(
      "Source path is not a directory: file.mp3",
    );
  });

  it("rejects an output directory inside the source", async () => {
    await expect(resolveConfig(parseArgs(argv("-o", "./original/opus")), workDir)).rejects.toThrow(
      "Output directory must not be inside the source directory",
    );
  });

  it("accepts an output directory beside the source", async () => {
    const config = await resolveConfig(parseArgs(argv("-o", "./original-opus")), workDir);
    expect(config.outputDir).toBe(path.join(workDir, "original-opus"));
  });

  it("rejects identical source and output", async () => {
    await expect(resolveConfig(parseArgs(argv("-o", "./original")), workDir)).rejects.toThrow(
      "Source and output directories must differ",
    );
  });
});
