import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCleaner } from "./cleanRunner";
import { UserCancelledError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import type { FilePicker } from "../types";

let workDir: string;

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), "ascii-scrub-runner-"));
});

afterEach(async () => {
  await fs.rm(workDir, { recursive: true, force: true });
});

function fakeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function pickerFor(filePath: string): FilePicker {
  return { pick: vi.fn().mockResolvedValue(filePath) };
}

describe("runCleaner", () => {
  it("cleans the picked file into its sibling output", async () => {
    const inputPath = path.join(workDir, "build.txt");
    await fs.writeFile(inputPath, "\u001b[32m┌─┐\u001b[0m\n└─┘\n");
    const logger = fakeLogger();

    const summary = await runCleaner({ picker: pickerFor(inputPath), logger });

    const outputPath = path.join(workDir, "build_output.txt");
    expect(await fs.readFile(outputPath, "utf8")).toBe("+-+\n+-+\n");
    expect(summary).toMatchObject({
      inputPath,
      outputPath,
      lines: 2,
      escapesRemoved: 2,
      glyphsReplaced: 6,
    });
    expect(summary.durationMs).toBeGreaterThanOrEqual(0);
    expect(logger.info).toHaveBeenNthCalledWith(1, `Processing file: ${inputPath}`);
    expect(logger.info).toHaveBeenNthCalledWith(2, `Output will be saved to: ${outputPath}`);
    expect(logger.info).toHaveBeenNthCalledWith(3, `Cleaning completed. Output saved to ${outputPath}`);
  });

  it("creates nothing when the picker is cancelled", async () => {
    const picker: FilePicker = { pick: vi.fn().mockRejectedValue(new UserCancelledError()) };
    const logger = fakeLogger();

    await expect(runCleaner({ picker, logger })).rejects.toBeInstanceOf(UserCancelledError);
    expect(await fs.readdir(workDir)).toEqual([]);
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("propagates I/O failures", async () => {
    const inputPath = path.join(workDir, "gone.txt");

    await expect(runCleaner({ picker: pickerFor(inputPath), logger: fakeLogger() })).rejects.toMatchObject({
      name: "IoError",
      operation: "open",
    });
  });
});
