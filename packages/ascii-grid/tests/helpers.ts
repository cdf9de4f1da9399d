import type { IncomingMessage, ServerResponse } from "node:http";
import { createServer } from "node:http";
import { fileURLToPath } from "node:url";
import type { ByteSource } from "../src/source.js";

/** Data rows of the sample grid, northern row first. */
export const SAMPLE_ROWS = [
  "-9999 -9999 5 2",
  "-9999 20 100 36",
  "3 8 35 10",
  "32 42 50 6",
  "88 75 27 9",
  "13 5 1 -9999",
];

/** The values of {@link SAMPLE_ROWS}, as numbers. */
export const SAMPLE_VALUES = SAMPLE_ROWS.map((row) =>
  row.split(" ").map(Number),
);

/** A 4 x 6 grid with 50 unit cells whose lower-left corner is the origin. */
export const SAMPLE = [
  "ncols         4",
  "nrows         6",
  "xllcorner     0.0",
  "yllcorner     0.0",
  "cellsize      50.0",
  "NODATA_value  -9999",
  ...SAMPLE_ROWS,
  "",
].join("\n");

/** Byte offset of each data row of {@link SAMPLE}. */
export const SAMPLE_OFFSETS = SAMPLE_ROWS.map((row) => SAMPLE.indexOf(row));

/** Same content as {@link SAMPLE}, on disk. */
export const SAMPLE_PATH = fileURLToPath(
  new URL("./fixtures/sample.asc", import.meta.url),
);

/** Build grid text from header lines and data rows. */
export function gridText(header: string[], rows: string[]): string {
  return [...header, ...rows, ""].join("\n");
}

/**
 * In-memory source that records its fetches and can be made to fail.
 *
 * Every fetch starting at or after `failFrom` rejects. With `rejectPastEnd`
 * set, a fetch starting at or past the end rejects with code 416 the way an
 * HTTP source does.
 */
export class TestSource implements ByteSource {
  readonly url = new URL("memory://test.asc");
  readonly fetches: number[] = [];
  failFrom = Number.POSITIVE_INFINITY;
  rejectPastEnd = false;
  closed = false;
  private readonly data: Uint8Array;

  constructor(text: string) {
    this.data = new TextEncoder().encode(text);
  }

  async fetch(offset: number, length?: number): Promise<ArrayBuffer> {
    this.fetches.push(offset);
    if (offset >= this.failFrom) {
      throw new Error(`Simulated read failure at ${offset}`);
    }
    if (this.rejectPastEnd && offset >= this.data.length) {
      throw Object.assign(new Error("Range Not Satisfiable"), { code: 416 });
    }
    const end = length != null ? offset + length : this.data.length;
    const slice = this.data.slice(offset, end);
    const buffer = new ArrayBuffer(slice.byteLength);
    new Uint8Array(buffer).set(slice);
    return buffer;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** A local HTTP server answering byte range requests for one document. */
export type TestServer = {
  url: URL;
  /** Range headers received, in order. */
  ranges: string[];
  close(): Promise<void>;
};

/** Serve `text` on a free local port, honouring `Range: bytes=a-b`. */
export async function serveText(text: string): Promise<TestServer> {
  const body = Buffer.from(text, "latin1");
  const ranges: string[] = [];

  const handle = (req: IncomingMessage, res: ServerResponse) => {
    const range = req.headers.range;
    if (range == null) {
      res.writeHead(200, { "content-length": body.length });
      res.end(req.method === "HEAD" ? undefined : body);
      return;
    }
    ranges.push(range);

    const match = /^bytes=(\d+)-(\d*)$/.exec(range);
    const start = match ? Number(match[1]) : Number.NaN;
    if (!(start < body.length)) {
      res.writeHead(416, { "content-range": `bytes */${body.length}` });
      res.end();
      return;
    }
    const last =
      match && match[2] !== ""
        ? Math.min(Number(match[2]), body.length - 1)
        : body.length - 1;
    res.writeHead(206, {
      "accept-ranges": "bytes",
      "content-length": last - start + 1,
      "content-range": `bytes ${start}-${last}/${body.length}`,
    });
    res.end(req.method === "HEAD" ? undefined : body.subarray(start, last + 1));
  };

  const server = createServer(handle);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address == null || typeof address === "string") {
    throw new Error("Test server is not listening on a port");
  }
  const { port } = address;

  return {
    url: new URL(`http://127.0.0.1:${port}/sample.asc`),
    ranges,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
