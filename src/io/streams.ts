import { createReadStream as fsCreateReadStream, createWriteStream as fsCreateWriteStream } from "node:fs";
import type { ReadStream, WriteStream } from "node:fs";
import { finished } from "node:stream/promises";

const READ_HIGH_WATER_MARK = 64 * 1024;
const WRITE_HIGH_WATER_MARK = 16 * 1024;

const abortError = () => new Error("Operation aborted");

const attachAbortHandler = (stream: ReadStream | WriteStream, signal?: AbortSignal): void => {
  if (!signal) {
    return;
  }

  if (signal.aborted) {
    stream.destroy(abortError());
    return;
  }

  signal.addEventListener(
    "abort",
    () => {
      stream.destroy(abortError());
    },
    { once: true }
  );
};

/** Text stream (UTF-8) by default; pass `binary` for Buffer chunks. */
export const createReadStream = (
  path: string,
  signal?: AbortSignal,
  mode: "text" | "binary" = "text"
): ReadStream => {
  const stream = fsCreateReadStream(path, {
    encoding: mode === "text" ? "utf8" : undefined,
    highWaterMark: READ_HIGH_WATER_MARK,
    signal,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

export const createWriteStream = (path: string, signal?: AbortSignal): WriteStream => {
  const stream = fsCreateWriteStream(path, {
    highWaterMark: WRITE_HIGH_WATER_MARK,
    signal,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

export const readBytes = async (path: string, signal?: AbortSignal): Promise<Buffer> => {
  const chunks: Buffer[] = [];
  for await (const chunk of createReadStream(path, signal, "binary")) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
};

export const readText = async (path: string, signal?: AbortSignal): Promise<string> => {
  let text = "";
  for await (const chunk of createReadStream(path, signal)) {
    text += String(chunk);
  }
  return text;
};

export const writeBytes = async (path: string, bytes: Uint8Array, signal?: AbortSignal): Promise<void> => {
  const stream = createWriteStream(path, signal);
  stream.end(bytes);
  await finished(stream);
};
