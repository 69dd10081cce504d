import { Writable } from "node:stream";
import { finished, pipeline } from "node:stream/promises";
import type { Readable, Transform } from "node:stream";
import pkg from "stream-json";
const { parser } = pkg;

/** Receives the events of one JSON text, in document order. */
export interface JsonEventSink {
  writeStartObject(): void | Promise<void>;
  writeEndObject(): void | Promise<void>;
  writeStartArray(): void | Promise<void>;
  writeEndArray(): void | Promise<void>;
  writeKey(key: string): void | Promise<void>;
  writeString(value: string): void | Promise<void>;
  /** The number literal exactly as written, e.g. `"-12"` or `"1.5e3"`. */
  writeNumber(raw: string): void | Promise<void>;
  writeBoolean(value: boolean): void | Promise<void>;
  writeNull(): void | Promise<void>;
}

type JsonToken = {
  name: string;
  value?: unknown;
};

const tokenText = (token: JsonToken): string => {
  if (typeof token.value !== "string") {
    throw new Error(`Token ${token.name} is missing its value`);
  }
  return token.value;
};

const writeToken = (sink: JsonEventSink, token: JsonToken): void | Promise<void> => {
  switch (token.name) {
    case "startObject":
      return sink.writeStartObject();
    case "endObject":
      return sink.writeEndObject();
    case "startArray":
      return sink.writeStartArray();
    case "endArray":
      return sink.writeEndArray();
    case "keyValue":
      return sink.writeKey(tokenText(token));
    case "stringValue":
      return sink.writeString(tokenText(token));
    case "numberValue":
      return sink.writeNumber(tokenText(token));
    case "trueValue":
      return sink.writeBoolean(true);
    case "falseValue":
      return sink.writeBoolean(false);
    case "nullValue":
      return sink.writeNull();
    default:
      return;
  }
};

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

const createEventSink = (sink: JsonEventSink): Writable =>
  new Writable({
    objectMode: true,
    write(chunk: JsonToken, _encoding, callback) {
      try {
        const result = writeToken(sink, chunk);
        if (result) {
          result.then(() => callback(), (error: unknown) => callback(toError(error)));
        } else {
          callback();
        }
      } catch (error) {
        callback(toError(error));
      }
    },
  });

// Only packed tokens are needed; chunked string and number tokens are skipped.
const createTokenizer = (): Transform => parser({ streamValues: false });

export const createStreamParser = (sink: JsonEventSink): { parser: Transform; sink: Writable } => ({
  parser: createTokenizer(),
  sink: createEventSink(sink),
});

export const parseJsonStream = async (readable: Readable, sink: JsonEventSink): Promise<void> => {
  const { parser: parserStream, sink: eventSink } = createStreamParser(sink);
  await pipeline(readable, parserStream, eventSink);
};

const PROBE_CHUNK = 4096;

type Probe = {
  write(chunk: string): Promise<Error | undefined>;
  end(): Promise<Error | undefined>;
};

const createProbe = (): Probe => {
  const tokenizer = createTokenizer();
  let failure: Error | undefined;
  tokenizer.on("error", (error: Error) => {
    failure = error;
  });
  tokenizer.resume();
  return {
    write: (chunk) =>
      new Promise((resolve) => {
        tokenizer.write(chunk, (error) => resolve(error ?? failure));
      }),
    end: async () => {
      tokenizer.end();
      try {
        await finished(tokenizer);
        return undefined;
      } catch (error) {
        return toError(error);
      }
    },
  };
};

// Keeps surrogate pairs together so each chunk is valid UTF-16 on its own.
const chunkEnd = (text: string, end: number): number => {
  if (end >= text.length) return text.length;
  const code = text.charCodeAt(end - 1);
  return code >= 0xd800 && code <= 0xdbff ? end + 1 : end;
};

/**
 * UTF-16 index at which the tokenizer rejects `text`, or `text.length` when it
 * only fails at end of input. The tokenizer may hold back up to a few
 * characters of lookahead, so the index can sit slightly past the offending
 * character.
 *
 * The text is replayed twice: in large chunks to find the failing chunk, then
 * one code point at a time from the start of that chunk.
 */
export const locateParseError = async (text: string): Promise<number> => {
  const coarse = createProbe();
  let failedChunk = -1;
  for (let start = 0; start < text.length; ) {
    const end = chunkEnd(text, start + PROBE_CHUNK);
    if (await coarse.write(text.slice(start, end))) {
      failedChunk = start;
      break;
    }
    start = end;
  }
  if (failedChunk < 0) {
    return text.length;
  }

  const fine = createProbe();
  if (failedChunk > 0 && (await fine.write(text.slice(0, failedChunk)))) {
    return failedChunk;
  }
  let at = failedChunk;
  for (const char of text.slice(failedChunk, chunkEnd(text, failedChunk + PROBE_CHUNK))) {
    if (await fine.write(char)) {
      return at;
    }
    at += char.length;
  }
  return (await fine.end()) ? text.length : at;
};
