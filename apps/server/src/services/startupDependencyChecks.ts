import { stat } from "node:fs/promises";
import type pino from "pino";
import type { AppEnv } from "../config/env.js";

/**
 * Fail fast on an image source that is configured but cannot be used.
 * A missing image source only disables image display, so it is a warning.
 */
export async function runStartupDependencyChecks(
  logger: pino.Logger,
  config: Pick<AppEnv, "IMAGES_DIR" | "IMAGES_ARCHIVE" | "IMAGES_BASE_URL">
): Promise<void> {
  if (config.IMAGES_ARCHIVE) {
    await assertPath(config.IMAGES_ARCHIVE, "file", logger, "Bundled image archive");
    return;
  }
  if (config.IMAGES_DIR) {
    await assertPath(config.IMAGES_DIR, "directory", logger, "Image directory");
    return;
  }
  if (!config.IMAGES_BASE_URL) {
    logger.warn("No image source configured; set IMAGES_DIR, IMAGES_ARCHIVE or IMAGES_BASE_URL to display images");
  }
}

async function assertPath(path: string, expected: "file" | "directory", logger: pino.Logger, feature: string): Promise<void> {
  const stats = await stat(path).catch(() => null);
  const matches = expected === "file" ? stats?.isFile() : stats?.isDirectory();
  if (!matches) {
    logger.fatal({ path, expected, feature }, "Startup dependency check failed");
    throw new Error(`missing_image_source:${path}`);
  }
  logger.info({ path, feature }, "Startup dependency check passed");
}
