import type { Response } from "express";
import { Router } from "express";
import { exportNotReadyError, type DownloadableExport } from "../services/exportService.js";
import type { CodingContext } from "../types/context.js";
import { sendError } from "./httpErrors.js";

function sendDownload(res: Response, download: DownloadableExport) {
  res.setHeader("Content-Disposition", `attachment; filename="${download.filename}"`);
  return res.type(download.contentType).send(download.body);
}

export function createExportRouter(ctx: Pick<CodingContext, "exports" | "logger">) {
  const exportRouter = Router();

  exportRouter.post("/api/export/final", async (_req, res) => {
    try {
      const outcome = await ctx.exports.finalExport();
      if (outcome.status === "not_ready") {
        const notReady = exportNotReadyError(outcome.summary);
        return res.status(notReady.statusCode).json({
          error: notReady.code,
          detail: notReady.message,
          codedCount: outcome.summary.codedCount,
          total: outcome.summary.total
        });
      }
      return res.json({ status: outcome.status, path: outcome.path, filename: outcome.filename, rowCount: outcome.rowCount });
    } catch (error) {
      return sendError(res, error, ctx.logger, "export_failed");
    }
  });

  exportRouter.get("/api/export/partial", (_req, res) => {
    return sendDownload(res, ctx.exports.partialExport());
  });

  exportRouter.get("/api/export/backup", (_req, res) => {
    return sendDownload(res, ctx.exports.backupExport());
  });

  return exportRouter;
}
