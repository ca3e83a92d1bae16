import type pino from "pino";
import type { AnnotationSession } from "../services/annotationSession.js";
import type { ExportService } from "../services/exportService.js";
import type { ImageSource } from "../services/imageSource.js";
import type { ItemCatalog } from "./coding.js";

export interface CodingContext {
  catalog: ItemCatalog;
  session: AnnotationSession;
  exports: ExportService;
  images: ImageSource | null;
  logger: pino.Logger;
}
