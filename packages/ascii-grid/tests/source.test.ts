import { describe, expect, it } from "vitest";
import { FileSource } from "../src/source.js";
import { SAMPLE, SAMPLE_PATH } from "./helpers.js";

const decode = (bytes: ArrayBuffer) => new TextDecoder().decode(bytes);

describe("FileSource", () => {
  it("reads byte ranges", async () => {
    const source = new FileSource(SAMPLE_PATH);
    try {
      expect(decode(await source.fetch(0, 5))).toBe("ncols");
      expect(decode(await source.fetch(16, 5))).toBe("nrows");
    } finally {
      await source.close();
    }
  });

  it("reads to the end without a length", async () => {
    const source = new FileSource(SAMPLE_PATH);
    try {
      const tail = decode(await source.fetch(SAMPLE.length - 13));
      expect(tail).toBe("13 5 1 -9999\n");
    } finally {
      await source.close();
    }
  });

  it("returns what exists past the end", async () => {
    const source = new FileSource(SAMPLE_PATH);
    try {
      expect(decode(await source.fetch(SAMPLE.length - 3, 64))).toBe("99\n");
      expect((await source.fetch(SAMPLE.length + 10, 64)).byteLength).toBe(0);
    } finally {
      await source.close();
    }
  });

  it("reopens after being closed", async () => {
    const source = new FileSource(SAMPLE_PATH);
    await source.fetch(0, 1);
    await source.close();
    expect(decode(await source.fetch(0, 5))).toBe("ncols");
    await source.close();
  });

  it("uses a file URL", () => {
    expect(new FileSource(SAMPLE_PATH).url.protocol).toBe("file:");
  });

  it("rejects missing files", async () => {
    const source = new FileSource(`${SAMPLE_PATH}.missing`);
    await expect(source.fetch(0, 1)).rejects.toThrow(/ENOENT/);
    await expect(source.close()).resolves.toBeUndefined();
  });
});
