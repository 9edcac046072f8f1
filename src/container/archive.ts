/**
 * ZIP packaging of encoded items.
 *
 * Entries are stored under their qualified names; directory entries are
 * ignored on unpacking. Files are replaced atomically: the package is
 * written to a temporary sibling, synced, and renamed over the target, so
 * a failed write never leaves a partial archive under the canonical name.
 */

import { randomBytes } from "node:crypto";
import {
  closeSync,
  fsyncSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  writeSync,
} from "node:fs";
import { basename, dirname, join } from "node:path";
import { unzipSync, zipSync, type Zippable } from "fflate";
import { CorruptArchiveError, NotFoundError, describeError } from "./errors.js";

/** Conventional file extension for container archives */
export const ARCHIVE_EXTENSION = ".zdc";

/**
 * Pack encoded items into a ZIP archive.
 */
export function packArchive(entries: Iterable<[string, Uint8Array]>): Uint8Array {
  const files: Zippable = {};
  for (const [name, bytes] of entries) {
    files[name] = bytes;
  }
  return zipSync(files, { level: 6 });
}

/**
 * Unpack a ZIP archive into a name → bytes map.
 *
 * @throws CorruptArchiveError if the data is not a readable ZIP package
 */
export function unpackArchive(data: Uint8Array): Map<string, Uint8Array> {
  let files: Record<string, Uint8Array>;
  try {
    files = unzipSync(data);
  } catch (err) {
    throw new CorruptArchiveError(`Unreadable archive: ${describeError(err)}`);
  }

  const entries = new Map<string, Uint8Array>();
  for (const [name, bytes] of Object.entries(files)) {
    if (!name.endsWith("/")) {
      entries.set(name, bytes);
    }
  }
  return entries;
}

/**
 * Write bytes to a file by way of a temporary sibling and a rename.
 */
export function writeFileAtomic(filePath: string, data: Uint8Array): void {
  const tempPath = join(
    dirname(filePath),
    `.${basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`
  );

  let committed = false;
  try {
    const fd = openSync(tempPath, "wx");
    try {
      let offset = 0;
      while (offset < data.length) {
        offset += writeSync(fd, data, offset, data.length - offset);
      }
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, filePath);
    committed = true;
  } finally {
    if (!committed) {
      rmSync(tempPath, { force: true });
    }
  }
}

/**
 * Read an archive file.
 *
 * @throws NotFoundError if the file does not exist
 * @throws CorruptArchiveError if the file cannot be read
 */
export function readArchiveFile(filePath: string): Uint8Array {
  try {
    return readFileSync(filePath);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new NotFoundError(`No archive at ${filePath}`);
    }
    throw new CorruptArchiveError(`Failed to read archive ${filePath}: ${describeError(err)}`);
  }
}
