import { encodeVariant } from "../src/binary/builder.js";
import { Variant } from "../src/binary/reader.js";
import { validateVariant } from "../src/binary/validator.js";

const RECORDS = 5000;

const buildDocument = () =>
  encodeVariant(
    Array.from({ length: RECORDS }, (_, index) => ({
      id: index,
      name: `record-${index}`,
      score: index / 7,
      active: index % 2 === 0,
      tags: ["alpha", "beta", index % 3 === 0 ? "gamma" : null],
      location: { lat: 52.52 + index / 1e4, lon: 13.4 - index / 1e4 },
    }))
  );

async function main() {
  console.log("Starting benchmark...");
  const { metadata, value } = buildDocument();
  console.log(`Document: ${metadata.length} metadata bytes, ${value.length} value bytes`);

  let start = process.hrtime.bigint();
  validateVariant(metadata, value);
  let end = process.hrtime.bigint();
  console.log(`Validated in ${(Number(end - start) / 1e6).toFixed(2)}ms`);

  start = process.hrtime.bigint();
  const records = Variant.fromBytes(metadata, value).asArray();
  let lookups = 0;
  let checksum = 0;
  for (const record of records) {
    const object = record.asObject();
    checksum += object.get("id")?.asInt() ?? 0;
    checksum += object.get("location")?.getPath("lat")?.asDouble() ?? 0;
    lookups += 2;
  }
  end = process.hrtime.bigint();

  const duration = Number(end - start) / 1e9;
  console.log(`Read ${lookups} fields in ${duration.toFixed(3)}s (checksum ${checksum.toFixed(2)})`);
  console.log(`Throughput: ${(lookups / duration).toFixed(0)} lookups/s`);
}

main().catch(console.error);
