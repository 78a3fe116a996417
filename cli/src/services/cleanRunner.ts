import { performance } from "perf_hooks";
import { createLogger, type Logger } from "../utils/logger";
import { deriveOutputPath } from "./outputPath";
import { cleanFile } from "./lineDriver";
import type { FilePicker, RunSummary } from "../types";

export interface RunCleanerOptions {
  picker: FilePicker;
  logger?: Logger;
}

export async function runCleaner(options: RunCleanerOptions): Promise<RunSummary> {
  const logger = options.logger ?? createLogger("cleaner");

  const inputPath = await options.picker.pick();
  const outputPath = deriveOutputPath(inputPath);

  logger.info(`Processing file: ${inputPath}`);
  logger.info(`Output will be saved to: ${outputPath}`);

  const startedAt = performance.now();
  const stats = await cleanFile(inputPath, outputPath);
  const durationMs = performance.now() - startedAt;

  logger.debug("Line statistics", { ...stats });
  logger.info(`Cleaning completed. Output saved to ${outputPath}`);

  return { inputPath, outputPath, durationMs, ...stats };
}
