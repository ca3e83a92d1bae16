import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CodingError } from "../src/services/codingError.js";
import {
  DirectoryImageSource,
  RemoteImageSource,
  ZipArchiveImageSource,
  createImageSource,
  mimeFromName
} from "../src/services/imageSource.js";

function hasCode(code: string) {
  return (error: unknown) => error instanceof CodingError && error.code === code;
}

async function withTempDir(run: (dir: string) => Promise<void>) {
  const dir = await mkdtemp(join(tmpdir(), "coding-images-"));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

function crc32(data: Buffer): number {
  let crc = 0xffffffff;
  for (const byte of data) {
    crc ^= byte;
    for (let k = 0; k < 8; k += 1) {
      crc = (crc >>> 1) ^ (0xedb88320 & -(crc & 1));
    }
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/** Builds an uncompressed (stored) zip archive in memory. */
function storedZip(files: Array<{ name: string; data: string }>): Buffer {
  const locals: Buffer[] = [];
  const centrals: Buffer[] = [];
  let offset = 0;

  for (const file of files) {
    const name = Buffer.from(file.name, "utf-8");
    const data = Buffer.from(file.data, "utf-8");
    const crc = crc32(data);

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt16LE(0, 6);
    local.writeUInt16LE(0, 8);
    local.writeUInt16LE(0, 10);
    local.writeUInt16LE(33, 12);
    local.writeUInt32LE(crc, 14);
    local.writeUInt32LE(data.length, 18);
    local.writeUInt32LE(data.length, 22);
    local.writeUInt16LE(name.length, 26);
    local.writeUInt16LE(0, 28);
    locals.push(local, name, data);

    const central = Buffer.alloc(46);
    central.writeUInt32LE(0x02014b50, 0);
    central.writeUInt16LE(20, 4);
    central.writeUInt16LE(20, 6);
    central.writeUInt16LE(0, 8);
    central.writeUInt16LE(0, 10);
    central.writeUInt16LE(0, 12);
    central.writeUInt16LE(33, 14);
    central.writeUInt32LE(crc, 16);
    central.writeUInt32LE(data.length, 20);
    central.writeUInt32LE(data.length, 24);
    central.writeUInt16LE(name.length, 28);
    central.writeUInt16LE(0, 30);
    central.writeUInt16LE(0, 32);
    central.writeUInt16LE(0, 34);
    central.writeUInt16LE(0, 36);
    central.writeUInt32LE(0, 38);
    central.writeUInt32LE(offset, 42);
    centrals.push(central, name);

    offset += local.length + name.length + data.length;
  }

  const centralDirectory = Buffer.concat(centrals);
  const end = Buffer.alloc(22);
  end.writeUInt32LE(0x06054b50, 0);
  end.writeUInt16LE(0, 4);
  end.writeUInt16LE(0, 6);
  end.writeUInt16LE(files.length, 8);
  end.writeUInt16LE(files.length, 10);
  end.writeUInt32LE(centralDirectory.length, 12);
  end.writeUInt32LE(offset, 16);
  end.writeUInt16LE(0, 20);

  return Buffer.concat([...locals, centralDirectory, end]);
}

test("DirectoryImageSource resolves by basename", async () => {
  await withTempDir(async (dir) => {
    await writeFile(join(dir, "photo_01.png"), Buffer.from([1, 2, 3]));
    const source = new DirectoryImageSource(dir);

    const image = await source.resolve("exports/2025/photo_01.png");

    assert.equal(image.basename, "photo_01.png");
    assert.equal(image.mimeType, "image/png");
    assert.deepEqual([...image.data], [1, 2, 3]);
    await assert.rejects(source.resolve("photo_02.png"), hasCode("image_not_found"));
  });
});

test("ZipArchiveImageSource finds images in any folder of the archive", async () => {
  await withTempDir(async (dir) => {
    const archivePath = join(dir, "images.zip");
    await writeFile(
      archivePath,
      storedZip([
        { name: "sample/", data: "" },
        { name: "sample/photo_01.jpg", data: "first" },
        { name: "photo_02.webp", data: "second" },
        { name: "sample/notes.txt", data: "not an image" }
      ])
    );
    const source = new ZipArchiveImageSource(archivePath);

    try {
      const first = await source.resolve("photo_01.jpg");
      assert.equal(first.data.toString("utf-8"), "first");
      assert.equal(first.mimeType, "image/jpeg");

      const second = await source.resolve("elsewhere/photo_02.webp");
      assert.equal(second.data.toString("utf-8"), "second");
      assert.equal(second.mimeType, "image/webp");

      await assert.rejects(source.resolve("notes.txt"), hasCode("image_not_found"));
      await assert.rejects(source.resolve("photo_03.jpg"), hasCode("image_not_found"));
    } finally {
      await source.close();
    }
  });
});

test("ZipArchiveImageSource reports an unreadable archive as a source failure", async () => {
  await withTempDir(async (dir) => {
    const archivePath = join(dir, "broken.zip");
    await writeFile(archivePath, "not a zip archive");
    const source = new ZipArchiveImageSource(archivePath);

    await assert.rejects(source.resolve("photo_01.jpg"), hasCode("image_source_failed"));
  });
});

test("RemoteImageSource fetches the encoded basename under the base URL", async () => {
  const requested: string[] = [];
  const source = new RemoteImageSource("https://images.example.test/set", async (url) => {
    requested.push(url);
    return new Response("jpeg-bytes", { status: 200, headers: { "content-type": "image/jpeg" } });
  });

  const image = await source.resolve("local/path/my photo.jpg");

  assert.deepEqual(requested, ["https://images.example.test/set/my%20photo.jpg"]);
  assert.equal(image.basename, "my photo.jpg");
  assert.equal(image.mimeType, "image/jpeg");
  assert.equal(image.data.toString("utf-8"), "jpeg-bytes");
});

test("RemoteImageSource maps 404, server errors and network failures", async () => {
  const notFound = new RemoteImageSource("https://images.example.test/", async () => new Response(null, { status: 404 }));
  const broken = new RemoteImageSource("https://images.example.test/", async () => new Response(null, { status: 503 }));
  const offline = new RemoteImageSource("https://images.example.test/", async () => {
    throw new Error("connect ECONNREFUSED");
  });

  await assert.rejects(notFound.resolve("a.jpg"), hasCode("image_not_found"));
  await assert.rejects(broken.resolve("a.jpg"), hasCode("image_source_failed"));
  await assert.rejects(offline.resolve("a.jpg"), hasCode("image_source_failed"));
});

test("createImageSource prefers archive, then directory, then remote", () => {
  assert.equal(createImageSource({ IMAGES_ARCHIVE: "a.zip", IMAGES_DIR: "imgs" })?.kind, "archive");
  assert.equal(createImageSource({ IMAGES_DIR: "imgs", IMAGES_BASE_URL: "https://images.example.test" })?.kind, "directory");
  assert.equal(createImageSource({ IMAGES_BASE_URL: "https://images.example.test" })?.kind, "remote");
  assert.equal(createImageSource({}), null);
});

test("mimeFromName falls back to jpeg", () => {
  assert.equal(mimeFromName("a.GIF"), "image/gif");
  assert.equal(mimeFromName("a.tiff"), "image/jpeg");
});
