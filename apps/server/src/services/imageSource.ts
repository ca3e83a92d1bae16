import { readFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { buffer } from "node:stream/consumers";
import yauzl, { type Entry, type ZipFile } from "yauzl";
import { CodingError } from "./codingError.js";
import { imageBasename } from "./itemCatalog.js";

export interface ResolvedImage {
  basename: string;
  mimeType: string;
  data: Buffer;
}

export interface ImageSource {
  readonly kind: "directory" | "archive" | "remote";
  resolve(filename: string): Promise<ResolvedImage>;
}

const IMAGE_EXTENSIONS = new Set([".jpg", ".jpeg", ".png", ".gif", ".webp", ".heic"]);

export class DirectoryImageSource implements ImageSource {
  readonly kind = "directory";

  constructor(private readonly rootDir: string) {}

  async resolve(filename: string): Promise<ResolvedImage> {
    const name = requireBasename(filename);
    const path = join(this.rootDir, name);
    try {
      const data = await readFile(path);
      return { basename: name, mimeType: mimeFromName(name), data };
    } catch (error) {
      if (isMissingFile(error)) {
        throw new CodingError("image_not_found", `Image not found: ${path}`, { cause: error });
      }
      throw new CodingError("image_source_failed", `Error loading image: ${path}`, { cause: error });
    }
  }
}

interface ArchiveIndex {
  zipFile: ZipFile;
  entries: Map<string, Entry>;
}

/**
 * Images bundled in a .zip archive, looked up by basename regardless of the
 * folder they sit in. The central directory is indexed once on first use.
 */
export class ZipArchiveImageSource implements ImageSource {
  readonly kind = "archive";
  private index: Promise<ArchiveIndex> | null = null;

  constructor(private readonly archivePath: string) {}

  async resolve(filename: string): Promise<ResolvedImage> {
    const name = requireBasename(filename);
    const { zipFile, entries } = await this.loadIndex();
    const entry = entries.get(name);
    if (!entry) {
      throw new CodingError("image_not_found", `Image not found in archive: ${name}`);
    }

    try {
      const data = await readEntry(zipFile, entry);
      return { basename: name, mimeType: mimeFromName(name), data };
    } catch (error) {
      throw new CodingError("image_source_failed", `Error loading image from archive: ${name}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    if (!this.index) return;
    const pending = this.index;
    this.index = null;
    const { zipFile } = await pending;
    zipFile.close();
  }

  private loadIndex(): Promise<ArchiveIndex> {
    if (!this.index) {
      this.index = indexArchive(this.archivePath).catch((error: unknown) => {
        this.index = null;
        throw new CodingError("image_source_failed", `Unable to open image archive ${this.archivePath}`, { cause: error });
      });
    }
    return this.index;
  }
}

type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export class RemoteImageSource implements ImageSource {
  readonly kind = "remote";
  private readonly baseUrl: string;

  constructor(baseUrl: string, private readonly fetchImpl: FetchLike = fetch, private readonly timeoutMs = 15000) {
    this.baseUrl = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  }

  async resolve(filename: string): Promise<ResolvedImage> {
    const name = requireBasename(filename);
    const url = new URL(encodeURIComponent(name), this.baseUrl).toString();

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      throw new CodingError("image_source_failed", `Error downloading image: ${url}`, { cause: error });
    }

    if (response.status === 404) {
      throw new CodingError("image_not_found", `Image not found: ${url}`);
    }
    if (!response.ok) {
      throw new CodingError("image_source_failed", `Image download failed with status ${response.status}: ${url}`);
    }

    const data = Buffer.from(await response.arrayBuffer());
    const contentType = response.headers.get("content-type");
    return {
      basename: name,
      mimeType: contentType?.startsWith("image/") ? contentType : mimeFromName(name),
      data
    };
  }
}

export interface ImageSourceConfig {
  IMAGES_DIR?: string;
  IMAGES_ARCHIVE?: string;
  IMAGES_BASE_URL?: string;
}

/** Archive first, then a plain directory, then a remote base URL. */
export function createImageSource(config: ImageSourceConfig): ImageSource | null {
  if (config.IMAGES_ARCHIVE) return new ZipArchiveImageSource(config.IMAGES_ARCHIVE);
  if (config.IMAGES_DIR) return new DirectoryImageSource(config.IMAGES_DIR);
  if (config.IMAGES_BASE_URL) return new RemoteImageSource(config.IMAGES_BASE_URL);
  return null;
}

export function mimeFromName(name: string): string {
  switch (extname(name).toLowerCase()) {
    case ".png":
      return "image/png";
    case ".gif":
      return "image/gif";
    case ".webp":
      return "image/webp";
    case ".heic":
      return "image/heic";
    default:
      return "image/jpeg";
  }
}

function requireBasename(filename: string): string {
  const name = imageBasename(filename);
  if (!name || name === "." || name === "..") {
    throw new CodingError("image_not_found", `Item has no usable filename: '${filename}'`);
  }
  return name;
}

function indexArchive(archivePath: string): Promise<ArchiveIndex> {
  return new Promise<ArchiveIndex>((resolve, reject) => {
    yauzl.open(archivePath, { lazyEntries: true, autoClose: false }, (error, zipFile) => {
      if (error || !zipFile) {
        reject(error ?? new Error("zip_open_failed"));
        return;
      }

      const entries = new Map<string, Entry>();
      zipFile.on("entry", (entry: Entry) => {
        const name = imageBasename(entry.fileName);
        if (!entry.fileName.endsWith("/") && IMAGE_EXTENSIONS.has(extname(name).toLowerCase()) && !entries.has(name)) {
          entries.set(name, entry);
        }
        zipFile.readEntry();
      });
      zipFile.on("end", () => resolve({ zipFile, entries }));
      zipFile.on("error", reject);
      zipFile.readEntry();
    });
  });
}

function readEntry(zipFile: ZipFile, entry: Entry): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    zipFile.openReadStream(entry, (error, stream) => {
      if (error || !stream) {
        reject(error ?? new Error("zip_stream_open_failed"));
        return;
      }
      buffer(stream).then(resolve, reject);
    });
  });
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
