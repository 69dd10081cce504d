#!/usr/bin/env node
import { analyzeVariant, type VariantReport } from "../binary/analyzer.js";
import { Variant } from "../binary/reader.js";
import { DEFAULT_MAX_DEPTH, validateVariant } from "../binary/validator.js";
import { fromJson, type LargeIntegerMode } from "../json/fromJson.js";
import { renderJson } from "../json/toJson.js";
import { readBytes, readText, writeBytes } from "../io/streams.js";

const [command, ...args] = process.argv.slice(2);
const consumedArgs = new Set<number>();

const readFlagValue = (flag: string): string | undefined => {
  const index = args.indexOf(flag);
  if (index === -1) {
    return undefined;
  }

  consumedArgs.add(index);
  const value = args[index + 1];
  if (value) {
    consumedArgs.add(index + 1);
  }
  return value;
};

const hasFlag = (flag: string): boolean => {
  const index = args.indexOf(flag);
  if (index !== -1) consumedArgs.add(index);
  return index !== -1;
};

const largeIntegersFlag = readFlagValue("--large-integers") ?? "error";
const maxDepthFlag = readFlagValue("--max-depth");
const outputFlag = readFlagValue("--output");
const unsortedFlag = hasFlag("--unsorted");
const positionalArgs = args.filter(
  (value, index) => !consumedArgs.has(index) && !value.startsWith("--")
);

const usage = (): never => {
  console.error(
    "Usage: variant-codec encode <input.json> <output.meta> <output.bin> [--large-integers error|decimal|double] [--unsorted]\n" +
      "       variant-codec decode <input.meta> <input.bin> [--output <output.json>]\n" +
      "       variant-codec validate <input.meta> <input.bin> [--max-depth <n>]\n" +
      "       variant-codec inspect <input.meta> <input.bin>"
  );
  process.exit(1);
};

const isLargeIntegerMode = (value: string): value is LargeIntegerMode =>
  value === "error" || value === "decimal" || value === "double";

const parseMaxDepth = (value: string | undefined): number => {
  if (value === undefined) return DEFAULT_MAX_DEPTH;
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 1) {
    throw new Error(`--max-depth must be a positive integer, got "${value}"`);
  }
  return depth;
};

const abortController = new AbortController();

process.on("SIGINT", () => {
  if (!abortController.signal.aborted) {
    console.error("Aborting: received SIGINT.");
    abortController.abort();
  }
});

const readPair = async (metaPath: string, binPath: string): Promise<[Buffer, Buffer]> => {
  const { signal } = abortController;
  return Promise.all([readBytes(metaPath, signal), readBytes(binPath, signal)]);
};

const printReport = (report: VariantReport): void => {
  console.log("Analysis Report:");
  console.log("  Sizes:");
  console.log(`    Metadata: ${report.metadataBytes} bytes`);
  console.log(`    Value:    ${report.valueBytes} bytes`);
  console.log("  Dictionary:");
  console.log(`    Entries:     ${report.dictionary.entries}`);
  console.log(`    Sorted:      ${report.dictionary.sorted ? "yes" : "no"}`);
  console.log(`    Offset size: ${report.dictionary.offsetSize}`);
  console.log("  Shape:");
  console.log(`    Objects:   ${report.objects}`);
  console.log(`    Arrays:    ${report.arrays}`);
  console.log(`    Max depth: ${report.maxDepth}`);
  if (report.largestArray) {
    console.log(`    Largest array: ${report.largestArray.path || "(root)"} (${report.largestArray.length} elements)`);
  }
  console.log("  Kinds:");
  for (const [kind, count] of [...report.kinds].sort(([a], [b]) => a.localeCompare(b))) {
    console.log(`    ${kind}: ${count}`);
  }
  console.log("  Field Name Deduplication:");
  console.log(`    Unique Names: ${report.fieldNames.uniqueCount}`);
  console.log(`    Total Uses:   ${report.fieldNames.totalCount}`);
  console.log(`    Unique Bytes: ${report.fieldNames.uniqueBytes}`);
  console.log(`    Total Bytes:  ${report.fieldNames.totalBytes}`);
  if (report.fieldNames.totalBytes > 0) {
    const saved = report.fieldNames.totalBytes - report.fieldNames.uniqueBytes;
    const ratio = (saved / report.fieldNames.totalBytes) * 100;
    console.log(`    Saved:        ${saved} bytes (${ratio.toFixed(2)}%)`);
  }
  console.log("  Strings:");
  console.log(`    Count: ${report.strings.count} (${report.strings.shortCount} short)`);
  console.log(`    Bytes: ${report.strings.bytes}`);
};

const encode = async (inputPath: string, metaPath: string, binPath: string): Promise<void> => {
  if (!isLargeIntegerMode(largeIntegersFlag)) {
    throw new Error(`--large-integers must be error, decimal or double, got "${largeIntegersFlag}"`);
  }
  const { signal } = abortController;
  console.log(`Input JSON: ${inputPath}`);
  console.log(`Output metadata: ${metaPath}`);
  console.log(`Output value: ${binPath}`);

  const text = await readText(inputPath, signal);
  const { metadata, value } = await fromJson(text, {
    largeIntegers: largeIntegersFlag,
    sortedDictionary: !unsortedFlag,
  });
  await Promise.all([writeBytes(metaPath, metadata, signal), writeBytes(binPath, value, signal)]);
  console.log(`Success: ${metadata.length} metadata bytes, ${value.length} value bytes.`);
};

const decode = async (metaPath: string, binPath: string): Promise<void> => {
  const [metadata, value] = await readPair(metaPath, binPath);
  const json = renderJson(Variant.tryNew(metadata, value));
  if (outputFlag) {
    await writeBytes(outputFlag, Buffer.from(`${json}\n`, "utf8"), abortController.signal);
    console.log(`Output JSON: ${outputFlag}`);
  } else {
    console.log(json);
  }
};

const validate = async (metaPath: string, binPath: string): Promise<void> => {
  const [metadata, value] = await readPair(metaPath, binPath);
  validateVariant(metadata, value, { maxDepth: parseMaxDepth(maxDepthFlag) });
  console.log("Valid.");
};

const inspect = async (metaPath: string, binPath: string): Promise<void> => {
  const [metadata, value] = await readPair(metaPath, binPath);
  printReport(analyzeVariant(Variant.tryNew(metadata, value)));
};

const run = async (): Promise<void> => {
  const [first, second, third] = positionalArgs;
  try {
    switch (command) {
      case "encode":
        if (!first || !second || !third) usage();
        else await encode(first, second, third);
        break;
      case "decode":
        if (!first || !second) usage();
        else await decode(first, second);
        break;
      case "validate":
        if (!first || !second) usage();
        else await validate(first, second);
        break;
      case "inspect":
        if (!first || !second) usage();
        else await inspect(first, second);
        break;
      default:
        usage();
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  }
};

void run();
