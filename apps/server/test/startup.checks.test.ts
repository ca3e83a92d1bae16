import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { runStartupDependencyChecks } from "../src/services/startupDependencyChecks.js";

const logger = pino({ level: "silent" });

test("startup checks accept an existing archive file and image directory", async () => {
  const dir = await mkdtemp(join(tmpdir(), "coding-startup-"));
  try {
    const archivePath = join(dir, "images.zip");
    await writeFile(archivePath, "zip");

    await runStartupDependencyChecks(logger, { IMAGES_ARCHIVE: archivePath });
    await runStartupDependencyChecks(logger, { IMAGES_DIR: dir });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("startup checks fail on a configured archive that is missing", async () => {
  const dir = await mkdtemp(join(tmpdir(), "coding-startup-"));
  try {
    const archivePath = join(dir, "missing.zip");
    await assert.rejects(runStartupDependencyChecks(logger, { IMAGES_ARCHIVE: archivePath }), {
      message: `missing_image_source:${archivePath}`
    });
    await assert.rejects(runStartupDependencyChecks(logger, { IMAGES_DIR: archivePath }), {
      message: `missing_image_source:${archivePath}`
    });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("startup checks only warn when no image source is configured", async () => {
  await runStartupDependencyChecks(logger, {});
});
