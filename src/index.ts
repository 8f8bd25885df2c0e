import "dotenv/config";
import { loadConfig } from "./config";
import { start } from "./server";
import { logger } from "./utils/logger";

start(loadConfig()).catch((err: unknown) => {
  logger.error("startup_failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
