import { Router } from "express";
import { z } from "zod";
import { describeSession, namedCounts } from "../services/sessionView.js";
import type { CodingContext } from "../types/context.js";
import { sendError } from "./httpErrors.js";

const indexParamSchema = z.coerce.number().int().nonnegative();

const groupSchema = z.object({
  code: z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)])
});

const contextSchema = z.object({
  code: z.union([z.literal(1), z.literal(2)])
});

const navigateSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("previous") }),
  z.object({ action: z.literal("next") }),
  z.object({ action: z.literal("next_uncoded") }),
  // 0-based; the page converts from the 1-based number it shows.
  z.object({ action: z.literal("goto"), index: z.number().int() })
]);

export function createCodingRouter(ctx: CodingContext) {
  const codingRouter = Router();
  const { catalog, session, logger } = ctx;

  codingRouter.get("/api/session", (_req, res) => {
    res.json(describeSession(catalog, session));
  });

  codingRouter.get("/api/summary", (_req, res) => {
    const summary = session.computeSummary();
    res.json({ ...summary, named: namedCounts(summary) });
  });

  codingRouter.post("/api/session/navigate", (req, res) => {
    const parsed = navigateSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    let notice: string | undefined;
    switch (parsed.data.action) {
      case "previous":
        session.previous();
        break;
      case "next":
        session.next();
        break;
      case "goto":
        session.goTo(parsed.data.index);
        break;
      case "next_uncoded":
        if (session.jumpToNextUncoded() === null) notice = "No uncoded images found after current position";
        break;
    }
    return res.json({ ...describeSession(catalog, session), notice });
  });

  codingRouter.put("/api/items/:index/group", async (req, res) => {
    const index = indexParamSchema.safeParse(req.params.index);
    if (!index.success) return res.status(400).json({ error: "index_out_of_range" });
    const parsed = groupSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    try {
      const labels = await session.setGroupLabel(index.data, parsed.data.code);
      return res.json({ index: index.data, labels });
    } catch (error) {
      return sendError(res, error, logger);
    }
  });

  codingRouter.post("/api/items/:index/context", async (req, res) => {
    const index = indexParamSchema.safeParse(req.params.index);
    if (!index.success) return res.status(400).json({ error: "index_out_of_range" });
    const parsed = contextSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    try {
      const labels = await session.toggleContextLabel(index.data, parsed.data.code);
      return res.json({ index: index.data, labels });
    } catch (error) {
      return sendError(res, error, logger);
    }
  });

  codingRouter.delete("/api/items/:index/labels", async (req, res) => {
    const index = indexParamSchema.safeParse(req.params.index);
    if (!index.success) return res.status(400).json({ error: "index_out_of_range" });

    try {
      const labels = await session.clear(index.data);
      return res.json({ index: index.data, labels });
    } catch (error) {
      return sendError(res, error, logger);
    }
  });

  codingRouter.get("/api/items/:index/image", async (req, res) => {
    const index = indexParamSchema.safeParse(req.params.index);
    if (!index.success || index.data >= catalog.items.length) {
      return res.status(400).json({ error: "index_out_of_range" });
    }
    if (!ctx.images) {
      return res.status(503).json({ error: "image_source_not_configured" });
    }

    try {
      const image = await ctx.images.resolve(catalog.items[index.data].filename);
      res.setHeader("Cache-Control", "private, max-age=300");
      return res.type(image.mimeType).send(image.data);
    } catch (error) {
      return sendError(res, error, logger.child({ index: index.data }));
    }
  });

  return codingRouter;
}
