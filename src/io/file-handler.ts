import { readFile, stat, writeFile } from "node:fs/promises";

import { IOError, IOErrorCode } from "../common/errors.js";

/** Smallest file that can hold a tag, a length and some content. */
export const MIN_FILE_SIZE = 4;

/**
 * Read a whole file into memory for scanning.
 * @throws IOError FileTooSmall for files under 4 bytes, ReadFailed otherwise.
 */
export async function loadFile(path: string): Promise<Uint8Array> {
  let size: number;
  try {
    size = (await stat(path)).size;
  } catch (e) {
    throw new IOError(IOErrorCode.ReadFailed, `error opening file: ${path}`, path, e);
  }
  if (size < MIN_FILE_SIZE) {
    throw new IOError(
      IOErrorCode.FileTooSmall,
      "file too small to contain ASN.1 structure",
      path,
    );
  }
  try {
    const buf = await readFile(path);
    return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
  } catch (e) {
    throw new IOError(IOErrorCode.ReadFailed, `error reading file: ${path}`, path, e);
  }
}

export async function saveToFile(bytes: Uint8Array, path: string): Promise<void> {
  try {
    await writeFile(path, bytes);
  } catch (e) {
    throw new IOError(IOErrorCode.WriteFailed, `failed to create file: ${path}`, path, e);
  }
}
