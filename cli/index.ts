import { loadConfig } from "./src/config";
import { createFilePicker } from "./src/services/filePicker";
import { runCleaner } from "./src/services/cleanRunner";
import { UserCancelledError } from "./src/utils/errors";
import { createLogger, setLogLevel } from "./src/utils/logger";
import { createBanner, createSummaryTable } from "./src/utils/terminalFormatter";

const logger = createLogger("ascii-scrub");

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  if (config.showBanner) {
    console.log(createBanner());
  }

  const picker = createFilePicker({
    cwd: config.startDir,
    input: process.stdin,
    output: process.stdout,
  });

  const summary = await runCleaner({ picker, logger });
  console.log(createSummaryTable(summary));
}

main().catch((error: unknown) => {
  if (error instanceof UserCancelledError) {
    logger.warn(error.message);
  } else if (error instanceof Error) {
    logger.error(error.message);
  } else {
    logger.error(String(error));
  }
  process.exitCode = 1;
});
