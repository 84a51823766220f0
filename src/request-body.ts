import type { IncomingHttpHeaders } from "node:http";
import type { Readable } from "node:stream";
import { BodyTooLargeError } from "./errors.js";

/**
 * Rejects a request whose declared content-length is over `limit`,
 * before a single body byte is read.
 */
export function assertContentLength(
  headers: IncomingHttpHeaders,
  limit: number
): void {
  const declared = headers["content-length"];
  if (declared === undefined) {
    return;
  }

  const length = Number(declared);
  if (Number.isFinite(length) && length > limit) {
    throw new BodyTooLargeError(limit);
  }
}

/**
 * Buffers the request body. Chunked bodies carry no length up front, so the
 * limit is enforced while reading. On overflow the rest of the body is
 * drained and dropped; the socket has to stay open for the 413.
 */
export function readRequestBody(
  stream: Readable,
  limit: number
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;

    const cleanup = () => {
      stream.off("data", onData);
      stream.off("end", onEnd);
      stream.off("error", onError);
    };

    const onData = (chunk: Buffer | string) => {
      const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      received += buffer.length;
      if (received > limit) {
        // keep the error listener: a reset while draining must not go unhandled
        stream.off("data", onData);
        stream.off("end", onEnd);
        stream.resume();
        reject(new BodyTooLargeError(limit));
        return;
      }
      chunks.push(buffer);
    };

    const onEnd = () => {
      cleanup();
      resolve(Buffer.concat(chunks));
    };

    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    stream.on("data", onData);
    stream.on("end", onEnd);
    stream.on("error", onError);
  });
}
