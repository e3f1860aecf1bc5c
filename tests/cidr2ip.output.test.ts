import { rm } from "node:fs/promises";
import { join } from "node:path";
import { formatCsvField, formatCsvRecord, writeCsv } from "../src/csv.js";
import { outputFileName, writeAddressCsv } from "../src/index.js";
import { makeTempDir, readLines } from "./helpers.js";

describe("formatCsvField", () => {
  it.each([
    ["10.0.0.1", "10.0.0.1"],
    ["2001:db8::1", "2001:db8::1"],
    ["", ""],
    ["a,b", '"a,b"'],
    ['say "hi"', '"say ""hi"""'],
    ["two\nlines", '"two\nlines"'],
    [" padded", '" padded"'],
  ])("formats %j as %j", (field, expected) => {
    expect(formatCsvField(field)).toBe(expected);
  });
});

describe("formatCsvRecord", () => {
  it("joins fields and ends the record with a newline", () => {
    expect(formatCsvRecord(["10.0.0.1"])).toBe("10.0.0.1\n");
    expect(formatCsvRecord(["a", "b,c"])).toBe('a,"b,c"\n');
  });
});

describe("outputFileName", () => {
  it("embeds the local date and time", () => {
    const date = new Date(2024, 0, 2, 3, 4, 5);
    expect(outputFileName(date)).toBe("cidr2ip_2024-01-02_03-04-05.csv");
  });

  it("accepts another application prefix", () => {
    const date = new Date(2023, 11, 31, 23, 59, 58);
    expect(outputFileName(date, "blocks")).toBe("blocks_2023-12-31_23-59-58.csv");
  });
});

describe("CSV files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes one address per record", async () => {
    const path = join(dir, "out.csv");
    await writeAddressCsv(["10.0.0.0", "10.0.0.1", "10.0.0.2"], path);

    expect(await readLines(path)).toEqual(["10.0.0.0", "10.0.0.1", "10.0.0.2"]);
  });

  it("writes an empty file for no addresses", async () => {
    const path = join(dir, "empty.csv");
    await writeAddressCsv([], path);

    expect(await readLines(path)).toEqual([]);
  });

  it("writes every record across chunk boundaries", async () => {
    const path = join(dir, "large.csv");
    const addresses = Array.from({ length: 10000 }, (_, i) => `10.0.${Math.floor(i / 256)}.${i % 256}`);
    await writeAddressCsv(addresses, path);

    expect(await readLines(path)).toEqual(addresses);
  });

  it("writes multi-field rows", async () => {
    const path = join(dir, "rows.csv");
    await writeCsv(path, [
      ["10.0.0.0/30", "4"],
      ["lab, east", "1"],
    ]);

    expect(await readLines(path)).toEqual(["10.0.0.0/30,4", '"lab, east",1']);
  });
});
