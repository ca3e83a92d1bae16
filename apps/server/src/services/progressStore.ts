import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { CodingError } from "./codingError.js";
import type { StoredProgressDocument } from "../types/coding.js";

/**
 * Flat persisted progress. Read in full once per session, rewritten in full on
 * every mutation. There is exactly one writer; two processes sharing a file are
 * last-write-wins.
 */
export interface ProgressStore {
  load(): Promise<unknown>;
  save(document: StoredProgressDocument): Promise<void>;
}

export class FileProgressStore implements ProgressStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw new CodingError("progress_unreadable", `Unable to read progress file ${this.filePath}`, { cause: error });
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new CodingError("progress_unreadable", `Progress file ${this.filePath} is not valid JSON`, { cause: error });
    }
  }

  async save(document: StoredProgressDocument): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
    await rename(tmpPath, this.filePath);
  }
}

export class MemoryProgressStore implements ProgressStore {
  private current: unknown;

  constructor(initial: unknown = {}) {
    this.current = structuredClone(initial);
  }

  async load(): Promise<unknown> {
    return structuredClone(this.current);
  }

  async save(document: StoredProgressDocument): Promise<void> {
    this.current = structuredClone(document);
  }

  snapshot(): unknown {
    return structuredClone(this.current);
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
