import type { FileHandle } from "node:fs/promises";
import { open } from "node:fs/promises";
import { pathToFileURL } from "node:url";

/**
 * A random-access byte source.
 *
 * Structurally compatible with the `@chunkd/source` sources (`SourceMemory`,
 * `SourceHttp`, `SourceView`), so any of them can back a reader.
 */
export interface ByteSource {
  readonly url: URL;

  /**
   * Read `length` bytes starting at `offset`. Reads past the end return the
   * bytes that exist (possibly none), never an error.
   */
  fetch(offset: number, length?: number): Promise<ArrayBuffer>;

  /** Release whatever the source holds open. */
  close?(): Promise<void>;
}

/**
 * A local file read by position.
 *
 * The file handle is opened on the first fetch and every fetch reads only the
 * requested range, so files larger than memory are fine.
 */
export class FileSource implements ByteSource {
  readonly url: URL;
  private readonly path: string;
  private handle: Promise<FileHandle> | null = null;

  constructor(path: string) {
    this.path = path;
    this.url = pathToFileURL(path);
  }

  async fetch(offset: number, length?: number): Promise<ArrayBuffer> {
    if (this.handle == null) {
      this.handle = open(this.path, "r");
    }
    let handle: FileHandle;
    try {
      handle = await this.handle;
    } catch (err) {
      // Forget the failed open so close() has nothing to release.
      this.handle = null;
      throw err;
    }

    let size = length;
    if (size == null) {
      const { size: fileSize } = await handle.stat();
      size = Math.max(0, fileSize - offset);
    }

    const buffer = new ArrayBuffer(size);
    const { bytesRead } = await handle.read(
      new Uint8Array(buffer),
      0,
      size,
      offset,
    );
    return bytesRead === size ? buffer : buffer.slice(0, bytesRead);
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle != null) {
      await (await handle).close();
    }
  }
}
