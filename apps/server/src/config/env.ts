import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z.string().default("info"),
  CORS_ORIGIN: z.string().default("http://localhost:3000"),
  METADATA_FILE: z.string().default("data/metadata.csv"),
  PROGRESS_FILE: z.string().default("data/coding_progress.json"),
  OUTPUT_FILE: z.string().default("data/coding-complete.csv"),
  IMAGES_DIR: optionalString,
  IMAGES_ARCHIVE: optionalString,
  IMAGES_BASE_URL: optionalString.pipe(z.string().url().optional())
});

export type AppEnv = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
