import path from "path";
import { z } from "zod";
import { ConfigError } from "./utils/errors";
import type { LogLevel } from "./utils/logger";

const booleanFlag = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .transform((value) => value === "1" || value === "true" || value === "yes");

const envSchema = z.object({
  ASCII_SCRUB_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  ASCII_SCRUB_START_DIR: z.string().min(1).optional(),
  ASCII_SCRUB_BANNER: booleanFlag.default("true"),
});

export interface AppConfig {
  logLevel: LogLevel;
  startDir: string;
  showBanner: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const { ASCII_SCRUB_LOG_LEVEL, ASCII_SCRUB_START_DIR, ASCII_SCRUB_BANNER } = parsed.data;

  return {
    logLevel: ASCII_SCRUB_LOG_LEVEL,
    startDir: ASCII_SCRUB_START_DIR ? path.resolve(cwd, ASCII_SCRUB_START_DIR) : cwd,
    showBanner: ASCII_SCRUB_BANNER,
  };
}
