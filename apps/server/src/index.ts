import { randomUUID } from "node:crypto";
import cors from "cors";
import express from "express";
import pino from "pino";
import { env } from "./config/env.js";
import { createCodingRouter } from "./routes/coding.js";
import { createExportRouter } from "./routes/exports.js";
import { createHealthRouter } from "./routes/health.js";
import { siteRouter } from "./routes/site.js";
import { AnnotationSession } from "./services/annotationSession.js";
import { ExportService } from "./services/exportService.js";
import { createImageSource } from "./services/imageSource.js";
import { loadItemCatalog } from "./services/itemCatalog.js";
import { FileProgressStore } from "./services/progressStore.js";
import { runStartupDependencyChecks } from "./services/startupDependencyChecks.js";
import type { CodingContext } from "./types/context.js";

const logger = pino({ level: env.LOG_LEVEL });

async function bootstrap(): Promise<CodingContext> {
  await runStartupDependencyChecks(logger, env);

  const catalog = await loadItemCatalog(env.METADATA_FILE);
  logger.info({ metadataFile: env.METADATA_FILE, items: catalog.items.length }, "Metadata loaded");

  const store = new FileProgressStore(env.PROGRESS_FILE);
  logger.info({ progressFile: env.PROGRESS_FILE, outputFile: env.OUTPUT_FILE }, "Progress store ready");
  const session = await AnnotationSession.open({ itemCount: catalog.items.length, store, logger });
  const exportService = new ExportService({ catalog, session, outputFile: env.OUTPUT_FILE, logger });

  return { catalog, session, exports: exportService, images: createImageSource(env), logger };
}

function createApp(ctx: CodingContext) {
  const app = express();
  const allowedOrigins = new Set([env.CORS_ORIGIN, `http://localhost:${env.PORT}`]);

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.has(origin)) {
          callback(null, true);
          return;
        }
        callback(new Error("cors_not_allowed"));
      }
    })
  );
  app.use((req, res, next) => {
    const requestId = req.header("x-request-id") || randomUUID();
    res.setHeader("x-request-id", requestId);
    req.headers["x-request-id"] = requestId;
    next();
  });
  app.use(express.json());

  app.use(siteRouter);
  app.use(createHealthRouter(ctx));
  app.use(createCodingRouter(ctx));
  app.use(createExportRouter(ctx));

  return app;
}

bootstrap()
  .then((ctx) => {
    createApp(ctx).listen(env.PORT, () => {
      logger.info({ port: env.PORT, imageSource: ctx.images?.kind ?? "none" }, "Image coding tool listening");
    });
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "Startup failed; no coding session was created");
    process.exitCode = 1;
  });
