import { Router } from "express";
import type { CodingContext } from "../types/context.js";

export function createHealthRouter(ctx: Pick<CodingContext, "catalog" | "images">) {
  const healthRouter = Router();

  healthRouter.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      items: ctx.catalog.items.length,
      imageSource: ctx.images?.kind ?? "none"
    });
  });

  return healthRouter;
}
